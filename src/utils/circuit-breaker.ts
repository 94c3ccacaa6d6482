/**
 * Circuit Breaker for Slides API Calls
 *
 * Stops sending requests to an endpoint that keeps failing, then lets a few
 * trial calls through after a cool-down.
 *
 * States: CLOSED (normal) → OPEN (blocking) → HALF_OPEN (probing)
 */

import { SlidesError } from '../errors';
import { safeLog } from './log-sanitizer';

// ============================================================================
// Types
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Consecutive counted failures before the circuit opens */
  failureThreshold: number;
  /** Time in ms before an open circuit lets a trial call through */
  resetTimeoutMs: number;
  /** Successful trial calls needed to close the circuit again */
  successThreshold: number;
  /**
   * Whether an error counts against the endpoint. A rejected batchUpdate
   * (HTTP 400) says nothing about the endpoint's health.
   */
  isFailure: (error: unknown) => boolean;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  totalRequests: number;
  totalFailures: number;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  resetTimeoutMs: 60_000,
  successThreshold: 1,
  isFailure: () => true,
};

// ============================================================================
// Circuit Breaker
// ============================================================================

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private successes = 0;
  private lastFailureTime: number | null = null;
  private totalRequests = 0;
  private totalFailures = 0;
  private readonly options: CircuitBreakerOptions;
  readonly name: string;

  constructor(name: string, options: Partial<CircuitBreakerOptions> = {}) {
    this.name = name;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Run `fn` unless the circuit is open.
   *
   * @throws CircuitOpenError while the circuit is open
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.totalRequests++;

    if (this.state === 'OPEN') {
      if (this.remainingMs() > 0) {
        throw new CircuitOpenError(this.name, this.remainingMs());
      }
      this.transitionTo('HALF_OPEN');
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      if (this.options.isFailure(error)) {
        this.onFailure();
      } else {
        this.onSuccess();
      }
      throw error;
    }
    this.onSuccess();
    return result;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
    };
  }

  reset(): void {
    this.transitionTo('CLOSED');
    this.failures = 0;
    this.successes = 0;
    this.lastFailureTime = null;
  }

  // --------------------------------------------------------------------------
  // Private
  // --------------------------------------------------------------------------

  private onSuccess(): void {
    if (this.state !== 'HALF_OPEN') {
      this.failures = 0;
      return;
    }
    this.successes++;
    if (this.successes >= this.options.successThreshold) {
      this.transitionTo('CLOSED');
      this.failures = 0;
      this.successes = 0;
    }
  }

  private onFailure(): void {
    this.failures++;
    this.totalFailures++;
    this.lastFailureTime = Date.now();

    if (this.state === 'HALF_OPEN') {
      this.successes = 0;
      this.transitionTo('OPEN');
    } else if (this.failures >= this.options.failureThreshold) {
      this.transitionTo('OPEN');
    }
  }

  private remainingMs(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.options.resetTimeoutMs - (Date.now() - this.lastFailureTime));
  }

  private transitionTo(next: CircuitState): void {
    if (this.state === next) return;
    safeLog.info(`[CircuitBreaker:${this.name}] ${this.state} → ${next}`, {
      failures: this.failures,
      successes: this.successes,
    });
    this.state = next;
  }
}

// ============================================================================
// Error
// ============================================================================

export class CircuitOpenError extends SlidesError {
  readonly serviceName: string;
  readonly remainingMs: number;

  constructor(serviceName: string, remainingMs: number) {
    super(`Circuit breaker OPEN for ${serviceName}, retry after ${Math.ceil(remainingMs / 1000)}s`);
    this.name = 'CircuitOpenError';
    this.serviceName = serviceName;
    this.remainingMs = remainingMs;
  }
}
