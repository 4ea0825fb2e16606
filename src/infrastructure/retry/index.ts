// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE — Retry Policies with Backoff
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type RetryConfig,
  type RetryEvent,
  type ExhaustionReason,
  type RetryPolicy,
  type BackoffCalculator,
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
} from './types.js';

export {
  BackoffCalculatorImpl,
  createBackoffCalculator,
  sleep,
  formatDelay,
} from './backoff.js';

export {
  RetryPolicyImpl,
  createRetryPolicy,
} from './policy.js';
