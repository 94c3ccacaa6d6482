/**
 * Retry with exponential backoff for Slides/Drive API calls
 */

import { SlidesApiError, SlidesError } from '../errors';
import { safeLog } from './log-sanitizer';

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableStatusCodes: number[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [408, 429, 500, 502, 503, 504],
};

/**
 * API errors retry on the configured status codes; network failures always
 * retry; every other library error (open circuit, closed connection, codec) never does.
 */
export function isRetryable(error: unknown, config: Pick<RetryConfig, 'retryableStatusCodes'>): boolean {
  if (error instanceof SlidesApiError) {
    return config.retryableStatusCodes.includes(error.status);
  }
  return !(error instanceof SlidesError);
}

/**
 * Retry an async operation with exponential backoff and jitter
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const finalConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  let delayMs = finalConfig.initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= finalConfig.maxRetries || !isRetryable(error, finalConfig)) {
        throw error;
      }

      const jitter = Math.random() * 0.3 * delayMs;
      const totalDelay = Math.min(delayMs + jitter, finalConfig.maxDelayMs);

      safeLog.warn(
        `[Retry] Attempt ${attempt + 1}/${finalConfig.maxRetries} failed. Retrying in ${Math.round(totalDelay)}ms...`,
        { error: error instanceof Error ? error.message : String(error) }
      );

      await new Promise((resolve) => setTimeout(resolve, totalDelay));
      delayMs = Math.min(delayMs * finalConfig.backoffMultiplier, finalConfig.maxDelayMs);
    }
  }
}
