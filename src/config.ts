/**
 * Environment configuration
 *
 * Every setting has a default, so an empty environment yields a usable config.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import { formatIssue } from './model/wire';

// ============================================================================
// Schemas
// ============================================================================

/** Empty strings count as unset. */
const optionalString = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());

const url = (fallback: string) =>
  z.preprocess((v) => (v === '' ? undefined : v), z.string().url().default(fallback));

const positiveInt = (fallback: number) =>
  z.preprocess((v) => (v === '' ? undefined : v), z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess((v) => (v === '' ? undefined : v), z.coerce.number().int().min(0).default(fallback));

const SlidesEnvSchema = z.object({
  SLIDES_API_BASE_URL: url('https://slides.googleapis.com/v1/presentations'),
  DRIVE_API_BASE_URL: url('https://www.googleapis.com/drive/v3/files'),
  SLIDES_REQUEST_TIMEOUT_MS: positiveInt(30_000),
  GOOGLE_QUOTA_PROJECT: optionalString,
  GOOGLE_CREDENTIALS_PATH: optionalString,
  SLIDES_MAX_RETRIES: nonNegativeInt(3),
  SLIDES_RETRY_INITIAL_DELAY_MS: nonNegativeInt(1_000),
  SLIDES_BREAKER_FAILURE_THRESHOLD: positiveInt(5),
  SLIDES_BREAKER_RESET_TIMEOUT_MS: positiveInt(60_000),
});

export interface SlidesConfig {
  apiBaseUrl: string;
  driveApiBaseUrl: string;
  requestTimeoutMs: number;
  quotaProject?: string;
  credentialsPath?: string;
  maxRetries: number;
  retryInitialDelayMs: number;
  breakerFailureThreshold: number;
  breakerResetTimeoutMs: number;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * @throws ConfigError listing every invalid variable
 */
export function loadSlidesConfig(env: Record<string, string | undefined> = process.env): SlidesConfig {
  const result = SlidesEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }

  const parsed = result.data;
  const config: SlidesConfig = {
    apiBaseUrl: stripTrailingSlash(parsed.SLIDES_API_BASE_URL),
    driveApiBaseUrl: stripTrailingSlash(parsed.DRIVE_API_BASE_URL),
    requestTimeoutMs: parsed.SLIDES_REQUEST_TIMEOUT_MS,
    maxRetries: parsed.SLIDES_MAX_RETRIES,
    retryInitialDelayMs: parsed.SLIDES_RETRY_INITIAL_DELAY_MS,
    breakerFailureThreshold: parsed.SLIDES_BREAKER_FAILURE_THRESHOLD,
    breakerResetTimeoutMs: parsed.SLIDES_BREAKER_RESET_TIMEOUT_MS,
  };
  if (parsed.GOOGLE_QUOTA_PROJECT) config.quotaProject = parsed.GOOGLE_QUOTA_PROJECT;
  if (parsed.GOOGLE_CREDENTIALS_PATH) config.credentialsPath = parsed.GOOGLE_CREDENTIALS_PATH;
  return config;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
