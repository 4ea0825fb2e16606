// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Retry Policy Types and Configuration
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryConfig {
  /** Total attempts, including the first */
  readonly maxAttempts: number;

  /** Delay in ms before the second attempt */
  readonly initialDelayMs: number;

  /** Upper bound for any single delay */
  readonly maxDelayMs: number;

  /** Growth factor between consecutive delays */
  readonly backoffMultiplier: number;

  /** Return false to stop retrying on this error */
  readonly isRetryable?: (error: Error, attempt: number) => boolean;

  /** Called before each retry */
  readonly onRetry?: (event: RetryEvent) => void;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
};

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryEvent {
  /** Attempt that just failed (1-based) */
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly error: Error;
  readonly delayMs: number;
}

export type ExhaustionReason = 'max_attempts' | 'non_retryable';

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when every attempt failed. `cause` is the last error.
 */
export class RetryExhaustedError extends Error {
  readonly name = 'RetryExhaustedError';
  readonly attempts: number;
  readonly allErrors: readonly Error[];
  readonly reason: ExhaustionReason;

  constructor(attempts: number, allErrors: readonly Error[], reason: ExhaustionReason) {
    const last = allErrors[allErrors.length - 1];
    super(`Retry exhausted after ${attempts} attempt(s): ${last?.message ?? 'unknown error'}`, { cause: last });
    this.attempts = attempts;
    this.allErrors = allErrors;
    this.reason = reason;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// INTERFACES
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
  execute<T>(fn: (attempt: number) => Promise<T>): Promise<T>;
  getConfig(): RetryConfig;
}

export interface BackoffCalculator {
  /** Delay before the retry that follows the given failed attempt */
  calculate(attempt: number): number;
}
