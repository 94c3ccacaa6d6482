/**
 * Slides API Connection
 *
 * `SlidesConnection` is the seam every orchestration function receives
 * explicitly. `SlidesClient` implements it over the REST API: bearer auth,
 * request timeout, retry with backoff and a circuit breaker per API.
 * Replies are validated for shape only and handed back unchanged.
 */

import { z } from 'zod';
import { loadSlidesConfig, type SlidesConfig } from '../config';
import { ConnectionClosedError, SlidesApiError } from '../errors';
import { decodeWith, JsonObjectSchema, type JsonObject } from '../model/wire';
import type { SlidesRequest } from '../requests/types';
import { CircuitBreaker } from '../utils/circuit-breaker';
import { safeLog } from '../utils/log-sanitizer';
import { DEFAULT_RETRY_CONFIG, withRetry, type RetryConfig } from '../utils/retry';
import { createTokenProvider, loadGoogleCredentials, type TokenProvider } from './google-auth';

// ============================================================================
// Schemas
// ============================================================================

const WriteControlSchema = z.object({
  requiredRevisionId: z.string().optional(),
  targetRevisionId: z.string().optional(),
});

export type WriteControl = z.infer<typeof WriteControlSchema>;

const BatchUpdateResponseSchema = z.object({
  presentationId: z.string(),
  replies: z.array(JsonObjectSchema).default([]),
  writeControl: WriteControlSchema.optional(),
});

export type BatchUpdateResponse = z.infer<typeof BatchUpdateResponseSchema>;

const DriveCopyResponseSchema = z.object({
  id: z.string().min(1),
});

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// ============================================================================
// Connection Interface
// ============================================================================

export interface SlidesConnection {
  getPresentation(presentationId: string): Promise<JsonObject>;
  getPage(presentationId: string, pageObjectId: string): Promise<JsonObject>;
  /** Body is Presentation JSON; the server assigns the id. */
  createPresentation(body: JsonObject): Promise<JsonObject>;
  batchUpdate(
    presentationId: string,
    requests: SlidesRequest[],
    writeControl?: WriteControl
  ): Promise<BatchUpdateResponse>;
  /** Drive file copy; resolves to the new file id. */
  copyPresentation(fileId: string, name: string): Promise<string>;
}

export type AuthHeaders = {
  Authorization: string;
  'x-goog-user-project'?: string;
  'Content-Type'?: string;
};

export interface SlidesClientOptions {
  tokenProvider: TokenProvider;
  config?: SlidesConfig;
}

export interface OpenSlidesClientOptions {
  /** Used instead of loading credentials. */
  tokenProvider?: TokenProvider;
  credentialsPath?: string;
  config?: SlidesConfig;
}

// ============================================================================
// Slides Client
// ============================================================================

export class SlidesClient implements SlidesConnection {
  private readonly config: SlidesConfig;
  private readonly tokenProvider: TokenProvider;
  private readonly retryConfig: Partial<RetryConfig>;
  private readonly slidesBreaker: CircuitBreaker;
  private readonly driveBreaker: CircuitBreaker;
  private isClosed = false;

  constructor(options: SlidesClientOptions) {
    this.config = options.config ?? loadSlidesConfig();
    this.tokenProvider = options.tokenProvider;
    this.retryConfig = {
      maxRetries: this.config.maxRetries,
      initialDelayMs: this.config.retryInitialDelayMs,
    };

    const breakerOptions = {
      failureThreshold: this.config.breakerFailureThreshold,
      resetTimeoutMs: this.config.breakerResetTimeoutMs,
      isFailure: countsAgainstEndpoint,
    };
    this.slidesBreaker = new CircuitBreaker('GoogleSlidesAPI', breakerOptions);
    this.driveBreaker = new CircuitBreaker('GoogleDriveAPI', breakerOptions);
  }

  /**
   * Client with configuration from the environment and a cached token
   * provider from the credentials file, unless either is given.
   */
  static async open(options: OpenSlidesClientOptions = {}): Promise<SlidesClient> {
    const config = options.config ?? loadSlidesConfig();
    if (options.tokenProvider) {
      return new SlidesClient({ tokenProvider: options.tokenProvider, config });
    }
    const credentials = await loadGoogleCredentials(options.credentialsPath ?? config.credentialsPath);
    const quotaProject =
      config.quotaProject ?? (credentials.type === 'authorized_user' ? credentials.quota_project_id : undefined);
    return new SlidesClient({
      tokenProvider: createTokenProvider(credentials),
      config: quotaProject ? { ...config, quotaProject } : config,
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Later calls raise ConnectionClosedError; requests already in flight complete. */
  close(): void {
    this.isClosed = true;
  }

  async getPresentation(presentationId: string): Promise<JsonObject> {
    const json = await this.send('getPresentation', this.slidesBreaker, this.slidesUrl(presentationId), {
      method: 'GET',
    });
    return decodeWith(JsonObjectSchema, json, 'Presentation');
  }

  async getPage(presentationId: string, pageObjectId: string): Promise<JsonObject> {
    const url = this.slidesUrl(`${presentationId}/pages/${encodeURIComponent(pageObjectId)}`);
    const json = await this.send('getPage', this.slidesBreaker, url, { method: 'GET' });
    return decodeWith(JsonObjectSchema, json, 'Page');
  }

  async createPresentation(body: JsonObject): Promise<JsonObject> {
    const json = await this.send('createPresentation', this.slidesBreaker, this.config.apiBaseUrl, {
      method: 'POST',
      body: JSON.stringify(body),
    });
    return decodeWith(JsonObjectSchema, json, 'Presentation');
  }

  async batchUpdate(
    presentationId: string,
    requests: SlidesRequest[],
    writeControl?: WriteControl
  ): Promise<BatchUpdateResponse> {
    const json = await this.send('batchUpdate', this.slidesBreaker, this.slidesUrl(`${presentationId}:batchUpdate`), {
      method: 'POST',
      body: JSON.stringify(writeControl ? { requests, writeControl } : { requests }),
    });
    return decodeWith(BatchUpdateResponseSchema, json, 'BatchUpdateResponse');
  }

  async copyPresentation(fileId: string, name: string): Promise<string> {
    const url = `${this.config.driveApiBaseUrl}/${encodeURIComponent(fileId)}/copy`;
    const json = await this.send('copyPresentation', this.driveBreaker, url, {
      method: 'POST',
      body: JSON.stringify({ name }),
    });
    return decodeWith(DriveCopyResponseSchema, json, 'DriveFile').id;
  }

  // --------------------------------------------------------------------------
  // Private
  // --------------------------------------------------------------------------

  private slidesUrl(path: string): string {
    return `${this.config.apiBaseUrl}/${path}`;
  }

  private async send(
    operation: string,
    breaker: CircuitBreaker,
    url: string,
    init: { method: 'GET' | 'POST'; body?: string }
  ): Promise<unknown> {
    if (this.isClosed) {
      throw new ConnectionClosedError(operation);
    }

    try {
      return await withRetry(
        () =>
          breaker.execute(async () => {
            const headers: AuthHeaders = buildAuthHeaders(await this.tokenProvider(), this.config.quotaProject);
            if (init.body !== undefined) headers['Content-Type'] = 'application/json';

            const response = await fetchWithTimeout(url, { ...init, headers }, this.config.requestTimeoutMs);
            if (!response.ok) {
              throw new SlidesApiError(operation, response.status, await response.text());
            }
            const data: unknown = await response.json();
            return data;
          }),
        this.retryConfig
      );
    } catch (error) {
      safeLog.warn(`[SlidesClient] ${operation} failed`, {
        status: error instanceof SlidesApiError ? error.status : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

// ============================================================================
// Public Helpers
// ============================================================================

/**
 * Opens a client, runs `fn` with it and closes it afterwards, whether `fn`
 * resolves or rejects.
 */
export async function withSlidesConnection<T>(
  fn: (connection: SlidesClient) => Promise<T>,
  options: OpenSlidesClientOptions = {}
): Promise<T> {
  const client = await SlidesClient.open(options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

export function buildAuthHeaders(accessToken: string, quotaProject?: string): AuthHeaders {
  const h: AuthHeaders = { Authorization: `Bearer ${accessToken}` };
  if (quotaProject) {
    h['x-goog-user-project'] = quotaProject;
  }
  return h;
}

export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...options, signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
  }
}

// ============================================================================
// Internal Helpers
// ============================================================================

/** Client errors other than timeouts and throttling leave the breaker alone. */
function countsAgainstEndpoint(error: unknown): boolean {
  if (!(error instanceof SlidesApiError)) return true;
  return error.status >= 500 || DEFAULT_RETRY_CONFIG.retryableStatusCodes.includes(error.status);
}
