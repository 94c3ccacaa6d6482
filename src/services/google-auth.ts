/**
 * Google Authentication Helper
 *
 * Access tokens for the Slides and Drive APIs. Supports two credential types:
 * - Service Account (JWT-based)
 * - Application Default Credentials (authorized_user refresh token)
 *
 * fetch-based, Zod validation, Node.js WebCrypto for RS256.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { webcrypto } from 'node:crypto';
import { z } from 'zod';
import { SlidesApiError, SlidesError } from '../errors';
import { safeLog } from '../utils/log-sanitizer';

// ============================================================================
// Schemas
// ============================================================================

/** ADC (authorized_user) credentials */
const ADCCredentialsSchema = z.object({
  type: z.literal('authorized_user'),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
  quota_project_id: z.string().optional(),
});

/** Service Account credentials */
const ServiceAccountCredentialsSchema = z.object({
  type: z.literal('service_account'),
  client_email: z.string().email(),
  private_key: z.string().min(1),
  token_uri: z.string().url().optional(),
  project_id: z.string().optional(),
});

export const GoogleCredentialsSchema = z.discriminatedUnion('type', [
  ADCCredentialsSchema,
  ServiceAccountCredentialsSchema,
]);

export type GoogleCredentials = z.infer<typeof GoogleCredentialsSchema>;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
  token_type: z.string(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/** Resolves a bearer token for each request. */
export type TokenProvider = () => Promise<string>;

// ============================================================================
// Constants
// ============================================================================

const GOOGLE_TOKEN_ENDPOINT = 'https://oauth2.googleapis.com/token';

/** Slides read/write plus Drive (copying presentations). */
export const DEFAULT_SCOPES = [
  'https://www.googleapis.com/auth/presentations',
  'https://www.googleapis.com/auth/drive',
].join(' ');

const DEFAULT_REFRESH_MARGIN_MS = 60_000;

// ============================================================================
// Public API
// ============================================================================

/**
 * Load Google credentials from a JSON file.
 *
 * Search order:
 * 1. Explicit credentialsPath
 * 2. GOOGLE_CREDENTIALS_PATH env
 * 3. gcloud ADC (~/.config/gcloud/application_default_credentials.json)
 */
export async function loadGoogleCredentials(credentialsPath?: string): Promise<GoogleCredentials> {
  const candidates = [
    credentialsPath,
    process.env.GOOGLE_CREDENTIALS_PATH,
    join(homedir(), '.config', 'gcloud', 'application_default_credentials.json'),
  ].filter((p): p is string => !!p);

  for (const filePath of candidates) {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      safeLog.debug('[GoogleAuth] Credentials file not readable', { filePath, error: String(error) });
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      safeLog.warn('[GoogleAuth] Credentials file is not JSON', { filePath, error: String(error) });
      continue;
    }

    const result = GoogleCredentialsSchema.safeParse(parsed);
    if (result.success) {
      return result.data;
    }
    safeLog.warn('[GoogleAuth] Unsupported credentials file', { filePath, issues: result.error.issues.length });
  }

  throw new SlidesError(
    `No valid Google credentials found. Searched: ${candidates.join(', ')}. ` +
      'Provide a service account key or run "gcloud auth application-default login".'
  );
}

/**
 * Get an access token from credentials.
 * Routes to JWT flow (service account) or refresh_token flow (ADC).
 *
 * @param subject - Email address to impersonate for Domain-Wide Delegation
 */
export async function getAccessToken(
  credentials: GoogleCredentials,
  scopes: string = DEFAULT_SCOPES,
  subject?: string
): Promise<TokenResponse> {
  if (credentials.type === 'service_account') {
    return getAccessTokenViaJWT(credentials, scopes, subject);
  }
  return getAccessTokenViaRefresh(credentials);
}

/**
 * Convenience: load credentials and get a fresh access token in one call.
 */
export async function authenticate(
  credentialsPath?: string
): Promise<{ accessToken: string; credentials: GoogleCredentials }> {
  const credentials = await loadGoogleCredentials(credentialsPath);
  const tokenResponse = await getAccessToken(credentials);
  return {
    accessToken: tokenResponse.access_token,
    credentials,
  };
}

export interface TokenProviderOptions {
  scopes?: string;
  subject?: string;
  /** Refresh this long before the token expires. */
  refreshMarginMs?: number;
}

/**
 * Caches the access token until shortly before it expires. Concurrent callers
 * share one in-flight exchange.
 */
export function createTokenProvider(
  credentials: GoogleCredentials,
  options: TokenProviderOptions = {}
): TokenProvider {
  const margin = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
  let cached: { token: string; expiresAt: number } | undefined;
  let pending: Promise<string> | undefined;

  return async () => {
    if (cached && Date.now() < cached.expiresAt - margin) {
      return cached.token;
    }
    if (!pending) {
      pending = getAccessToken(credentials, options.scopes, options.subject)
        .then((response) => {
          cached = { token: response.access_token, expiresAt: Date.now() + response.expires_in * 1000 };
          return response.access_token;
        })
        .finally(() => {
          pending = undefined;
        });
    }
    return pending;
  };
}

/** For callers that already hold a token. */
export function staticTokenProvider(accessToken: string): TokenProvider {
  return () => Promise.resolve(accessToken);
}

// ============================================================================
// Service Account JWT Flow
// ============================================================================

async function getAccessTokenViaJWT(
  credentials: z.infer<typeof ServiceAccountCredentialsSchema>,
  scopes: string,
  subject?: string
): Promise<TokenResponse> {
  const now = Math.floor(Date.now() / 1000);

  const header = base64url(JSON.stringify({ alg: 'RS256', typ: 'JWT' }));
  const payloadData: Record<string, string | number> = {
    iss: credentials.client_email,
    scope: scopes,
    aud: GOOGLE_TOKEN_ENDPOINT,
    iat: now,
    exp: now + 3600,
  };

  // Domain-Wide Delegation: impersonate user
  if (subject) {
    payloadData.sub = subject;
  }

  const signatureInput = `${header}.${base64url(JSON.stringify(payloadData))}`;
  const signature = await signRs256(credentials.private_key, signatureInput);
  const jwt = `${signatureInput}.${Buffer.from(signature).toString('base64url')}`;

  const response = await fetch(credentials.token_uri ?? GOOGLE_TOKEN_ENDPOINT, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({
      grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
      assertion: jwt,
    }).toString(),
  });

  if (!response.ok) {
    throw new SlidesApiError('JWT token exchange', response.status, await response.text());
  }

  return TokenResponseSchema.parse(await response.json());
}

// ============================================================================
// ADC Refresh Token Flow
// ============================================================================

async function getAccessTokenViaRefresh(
  credentials: z.infer<typeof ADCCredentialsSchema>
): Promise<TokenResponse> {
  const response = await fetch(GOOGLE_TOKEN_ENDPOINT, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({
      client_id: credentials.client_id,
      client_secret: credentials.client_secret,
      refresh_token: credentials.refresh_token,
      grant_type: 'refresh_token',
    }).toString(),
  });

  if (!response.ok) {
    throw new SlidesApiError('Token exchange', response.status, await response.text());
  }

  return TokenResponseSchema.parse(await response.json());
}

// ============================================================================
// Helpers
// ============================================================================

function base64url(input: string): string {
  return Buffer.from(input, 'utf-8').toString('base64url');
}

function pemToDer(pem: string): Buffer {
  const b64 = pem
    .replace(/-----BEGIN [^-]+-----/g, '')
    .replace(/-----END [^-]+-----/g, '')
    .replace(/\s+/g, '');
  return Buffer.from(b64, 'base64');
}

async function signRs256(privateKeyPem: string, data: string): Promise<ArrayBuffer> {
  const key = await webcrypto.subtle.importKey(
    'pkcs8',
    pemToDer(privateKeyPem),
    { name: 'RSASSA-PKCS1-v1_5', hash: 'SHA-256' },
    false,
    ['sign']
  );
  return webcrypto.subtle.sign('RSASSA-PKCS1-v1_5', key, Buffer.from(data, 'utf-8'));
}
