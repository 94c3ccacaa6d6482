/**
 * Log Sanitizer
 *
 * Masks credentials before anything reaches the log, and escapes line
 * breaks and control characters so one call is one log line.
 */

// ============================================================================
// Patterns
// ============================================================================

const SENSITIVE_PATTERNS: Array<{
  pattern: RegExp;
  replacement: string;
  description: string;
}> = [
  // PEM private keys (service-account JSON embeds one)
  {
    pattern: /-----BEGIN[A-Z\s]+PRIVATE KEY-----[\s\S]*?-----END[A-Z\s]+PRIVATE KEY-----/g,
    replacement: '***PRIVATE_KEY***',
    description: 'PEM Private Key',
  },

  // JWT tokens (must come before the assignment pattern)
  {
    pattern: /\beyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*\b/g,
    replacement: '***JWT_TOKEN***',
    description: 'JWT Token',
  },

  // Google OAuth
  {
    pattern: /\bya29\.[a-zA-Z0-9_-]{20,}/g,
    replacement: 'ya29.***REDACTED***',
    description: 'Google OAuth Access Token',
  },
  {
    pattern: /\b1\/\/[a-zA-Z0-9_-]{20,}/g,
    replacement: '1//***REDACTED***',
    description: 'Google OAuth Refresh Token',
  },
  {
    pattern: /\bAIza[0-9A-Za-z_-]{35}\b/g,
    replacement: 'AIza***REDACTED***',
    description: 'Google API Key',
  },

  // Authorization headers
  {
    pattern: /(Bearer|Basic)\s+(?!\*\*\*)[a-zA-Z0-9+/=._-]{8,}/gi,
    replacement: '$1 ***REDACTED***',
    description: 'Authorization Header',
  },

  // Secret assignments (skip values that are already redacted)
  {
    pattern:
      /(password|secret|token|api_key|apikey|client_secret|refresh_token|private_key)["']?\s*[:=]\s*["']?(?!\*\*\*)([^"'\s,}&]{8,})["']?/gi,
    replacement: '$1=***REDACTED***',
    description: 'Password/Secret Assignment',
  },

  // Email addresses (partial masking)
  {
    pattern: /\b([a-zA-Z0-9._%+-]+)@([a-zA-Z0-9.-]+\.[a-zA-Z]{2,})\b/g,
    replacement: '***@$2',
    description: 'Email Address',
  },
];

const INJECTION_PATTERNS: Array<{
  pattern: RegExp;
  replacement: string;
}> = [
  // ANSI escape sequences (before the ESC byte itself is stripped)
  { pattern: /\x1B\[[0-9;]*[A-Za-z]/g, replacement: '' },

  // CRLF injection
  { pattern: /\r\n/g, replacement: '\\r\\n' },
  { pattern: /\r/g, replacement: '\\r' },
  { pattern: /\n/g, replacement: '\\n' },

  // Control characters
  { pattern: /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, replacement: '' },
];

const SENSITIVE_KEY_FRAGMENTS = [
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credential',
  'private_key',
];

const MAX_DEPTH = 10;

// ============================================================================
// Public API
// ============================================================================

export function sanitize(input: string): string {
  let result = input;
  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  for (const { pattern, replacement } of INJECTION_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

/**
 * Sanitises strings at any depth. Scalar values under sensitive keys are
 * replaced outright; Error instances become `{ name, message }`.
 */
export function sanitizeValue(value: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) return '[MAX_DEPTH_EXCEEDED]';
  if (typeof value === 'string') return sanitize(value);
  if (value instanceof Error) {
    return { name: value.name, message: sanitize(value.message) };
  }
  if (Array.isArray(value)) return value.map((item) => sanitizeValue(item, depth + 1));
  if (typeof value !== 'object' || value === null) return value;
  return sanitizeRecord(Object.entries(value), depth);
}

function sanitizeRecord(entries: Array<[string, unknown]>, depth: number): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    const lowerKey = key.toLowerCase();
    const isSensitiveKey = SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment));
    result[key] =
      isSensitiveKey && (typeof value === 'string' || typeof value === 'number')
        ? '***REDACTED***'
        : sanitizeValue(value, depth + 1);
  }
  return result;
}

// ============================================================================
// Structured Logging
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function emitLog(level: LogLevel, message: string, context?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;

  const contextFields =
    typeof context === 'object' && context !== null && !Array.isArray(context) && !(context instanceof Error)
      ? sanitizeRecord(Object.entries(context), 0)
      : context === undefined
        ? {}
        : { context: sanitizeValue(context) };

  const payload = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message: sanitize(message),
    ...contextFields,
  });

  if (level === 'error') {
    console.error(payload);
  } else if (level === 'warn') {
    console.warn(payload);
  } else if (level === 'debug') {
    console.debug(payload);
  } else {
    console.log(payload);
  }
}

export interface SafeLog {
  log: (message: string, context?: unknown) => void;
  debug: (message: string, context?: unknown) => void;
  info: (message: string, context?: unknown) => void;
  warn: (message: string, context?: unknown) => void;
  error: (message: string, context?: unknown) => void;
}

export const safeLog: SafeLog = {
  log: (message, context) => emitLog('info', message, context),
  debug: (message, context) => emitLog('debug', message, context),
  info: (message, context) => emitLog('info', message, context),
  warn: (message, context) => emitLog('warn', message, context),
  error: (message, context) => emitLog('error', message, context),
};
