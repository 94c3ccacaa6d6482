/**
 * Tests for Google Authentication helper.
 *
 * Covers:
 * - Credential loading (ADC + Service Account)
 * - Access token exchange (refresh_token + JWT)
 * - Token provider caching
 *
 * Note: JWT signing tests use a real RSA key generated at test time.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { generateKeyPairSync } from 'node:crypto';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SlidesApiError } from '../errors';
import {
  authenticate,
  createTokenProvider,
  getAccessToken,
  loadGoogleCredentials,
  staticTokenProvider,
} from './google-auth';

vi.mock('../utils/log-sanitizer', () => ({
  safeLog: {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// ============================================================================
// Fixtures
// ============================================================================

const { privateKey } = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  publicKeyEncoding: { type: 'spki', format: 'pem' },
  privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
});

const MOCK_ADC = {
  type: 'authorized_user' as const,
  client_id: 'test-client-id',
  client_secret: 'test-client-secret',
  refresh_token: 'test-refresh-token',
};

const MOCK_SA = {
  type: 'service_account' as const,
  client_email: 'deck-writer@example-project.iam.gserviceaccount.com',
  private_key: privateKey,
  token_uri: 'https://oauth2.googleapis.com/token',
  project_id: 'example-project',
};

function tokenResponse(accessToken: string, expiresIn = 3600): Response {
  return new Response(JSON.stringify({ access_token: accessToken, expires_in: expiresIn, token_type: 'Bearer' }), {
    status: 200,
  });
}

const fetchMock = vi.fn<typeof fetch>();
const originalFetch = globalThis.fetch;

beforeEach(() => {
  fetchMock.mockReset();
  globalThis.fetch = fetchMock;
});

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.unstubAllEnvs();
  vi.useRealTimers();
});

function requestBody(callIndex = 0): string {
  const body = fetchMock.mock.calls[callIndex]?.[1]?.body;
  return typeof body === 'string' ? body : '';
}

// ============================================================================
// loadGoogleCredentials
// ============================================================================

describe('loadGoogleCredentials', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'slides-auth-'));
    vi.stubEnv('HOME', dir);
    vi.stubEnv('GOOGLE_CREDENTIALS_PATH', '');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load ADC credentials from an explicit path', async () => {
    const path = join(dir, 'adc.json');
    await writeFile(path, JSON.stringify(MOCK_ADC));

    const creds = await loadGoogleCredentials(path);
    expect(creds).toEqual(MOCK_ADC);
  });

  it('should fall back to GOOGLE_CREDENTIALS_PATH', async () => {
    const path = join(dir, 'sa.json');
    await writeFile(path, JSON.stringify(MOCK_SA));
    vi.stubEnv('GOOGLE_CREDENTIALS_PATH', path);

    const creds = await loadGoogleCredentials(join(dir, 'missing.json'));
    expect(creds.type).toBe('service_account');
  });

  it('should skip files that are not valid credentials', async () => {
    const broken = join(dir, 'broken.json');
    const valid = join(dir, 'valid.json');
    await writeFile(broken, '{not json');
    await writeFile(valid, JSON.stringify(MOCK_ADC));
    vi.stubEnv('GOOGLE_CREDENTIALS_PATH', valid);

    await expect(loadGoogleCredentials(broken)).resolves.toEqual(MOCK_ADC);
  });

  it('should list every searched path when nothing is found', async () => {
    const missing = join(dir, 'missing.json');
    const adcPath = join(dir, '.config', 'gcloud', 'application_default_credentials.json');

    await expect(loadGoogleCredentials(missing)).rejects.toThrow(
      `No valid Google credentials found. Searched: ${missing}, ${adcPath}.`
    );
  });
});

// ============================================================================
// getAccessToken
// ============================================================================

describe('getAccessToken', () => {
  it('should exchange a refresh token for ADC credentials', async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse('test-access-token'));

    const result = await getAccessToken(MOCK_ADC);

    expect(result).toEqual({ access_token: 'test-access-token', expires_in: 3600, token_type: 'Bearer' });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://oauth2.googleapis.com/token');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(requestBody()).toContain('grant_type=refresh_token');
    expect(requestBody()).toContain('refresh_token=test-refresh-token');
  });

  it('should surface a failed refresh as SlidesApiError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('invalid_grant', { status: 400 }));

    const error = await getAccessToken(MOCK_ADC).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SlidesApiError);
    expect(error).toMatchObject({
      status: 400,
      message: 'Token exchange failed (400): invalid_grant',
    });
  });

  it('should sign a JWT assertion for service accounts', async () => {
    fetchMock.mockResolvedValueOnce(tokenResponse('test-sa-token'));

    const result = await getAccessToken(MOCK_SA, 'https://www.googleapis.com/auth/presentations', 'owner@example.com');

    expect(result.access_token).toBe('test-sa-token');
    const params = new URLSearchParams(requestBody());
    expect(params.get('grant_type')).toBe('urn:ietf:params:oauth:grant-type:jwt-bearer');

    const [header, payload, signature] = (params.get('assertion') ?? '').split('.');
    expect(JSON.parse(Buffer.from(header ?? '', 'base64url').toString())).toEqual({ alg: 'RS256', typ: 'JWT' });
    expect(JSON.parse(Buffer.from(payload ?? '', 'base64url').toString())).toMatchObject({
      iss: 'deck-writer@example-project.iam.gserviceaccount.com',
      scope: 'https://www.googleapis.com/auth/presentations',
      aud: 'https://oauth2.googleapis.com/token',
      sub: 'owner@example.com',
    });
    expect(signature).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it('should surface a failed JWT exchange', async () => {
    fetchMock.mockResolvedValueOnce(new Response('Invalid JWT', { status: 401 }));

    await expect(getAccessToken(MOCK_SA)).rejects.toThrow('JWT token exchange failed (401): Invalid JWT');
  });
});

// ============================================================================
// authenticate
// ============================================================================

describe('authenticate', () => {
  it('should load credentials and return an access token', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'slides-auth-'));
    const path = join(dir, 'adc.json');
    await writeFile(path, JSON.stringify(MOCK_ADC));
    fetchMock.mockResolvedValueOnce(tokenResponse('test-auth-token'));

    try {
      const result = await authenticate(path);
      expect(result.accessToken).toBe('test-auth-token');
      expect(result.credentials.type).toBe('authorized_user');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

// ============================================================================
// Token providers
// ============================================================================

describe('createTokenProvider', () => {
  it('should share one exchange and refresh shortly before expiry', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-05-01T00:00:00Z'));
    fetchMock
      .mockResolvedValueOnce(tokenResponse('test-token-1', 3600))
      .mockResolvedValueOnce(tokenResponse('test-token-2', 3600));

    const provider = createTokenProvider(MOCK_ADC);
    const [first, second] = await Promise.all([provider(), provider()]);
    expect([first, second]).toEqual(['test-token-1', 'test-token-1']);

    vi.setSystemTime(new Date('2026-05-01T00:58:59Z'));
    await expect(provider()).resolves.toBe('test-token-1');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    vi.setSystemTime(new Date('2026-05-01T00:59:00Z'));
    await expect(provider()).resolves.toBe('test-token-2');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should retry the exchange after a failure', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('unavailable', { status: 503 }))
      .mockResolvedValueOnce(tokenResponse('test-token'));

    const provider = createTokenProvider(MOCK_ADC);
    await expect(provider()).rejects.toThrow(SlidesApiError);
    await expect(provider()).resolves.toBe('test-token');
  });
});

describe('staticTokenProvider', () => {
  it('should always resolve the given token', async () => {
    await expect(staticTokenProvider('test-static-token')()).resolves.toBe('test-static-token');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
