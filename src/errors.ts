/**
 * Error taxonomy
 *
 * Codec and builder errors are raised locally and immediately.
 * Remote failures surface as SlidesApiError carrying the response body unchanged.
 */

// ============================================================================
// Base
// ============================================================================

export class SlidesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SlidesError';
  }
}

// ============================================================================
// Codec / Builder
// ============================================================================

/** Input JSON does not fit the schema of the named type. */
export class SchemaMismatchError extends SlidesError {
  readonly typeName: string;
  readonly issues: string[];

  constructor(typeName: string, issues: string[]) {
    super(`Schema mismatch decoding ${typeName}: ${issues.join('; ')}`);
    this.name = 'SchemaMismatchError';
    this.typeName = typeName;
    this.issues = issues;
  }
}

/** A tagged union has zero or several branches, or a branch lacks a field the operation needs. */
export class UnsupportedVariantError extends SlidesError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedVariantError';
  }
}

export class InvalidTextRangeError extends SlidesError {
  readonly startIndex: number;
  readonly endIndex: number;

  constructor(message: string, startIndex: number, endIndex: number) {
    super(`${message} [${startIndex}, ${endIndex})`);
    this.name = 'InvalidTextRangeError';
    this.startIndex = startIndex;
    this.endIndex = endIndex;
  }
}

// ============================================================================
// Transport / Configuration
// ============================================================================

/** Non-2xx response from the Slides or Drive API. */
export class SlidesApiError extends SlidesError {
  readonly operation: string;
  readonly status: number;
  readonly body: string;

  constructor(operation: string, status: number, body: string) {
    super(`${operation} failed (${status}): ${body.substring(0, 300)}`);
    this.name = 'SlidesApiError';
    this.operation = operation;
    this.status = status;
    this.body = body;
  }
}

export class ConnectionClosedError extends SlidesError {
  constructor(operation: string) {
    super(`Cannot ${operation}: connection is closed`);
    this.name = 'ConnectionClosedError';
  }
}

export class ConfigError extends SlidesError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
