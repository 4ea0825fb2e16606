// ═══════════════════════════════════════════════════════════════════════════════
// RETRY POLICY — Retry with Backoff Implementation
// ═══════════════════════════════════════════════════════════════════════════════

import {
  type BackoffCalculator,
  type RetryConfig,
  type RetryPolicy,
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
} from './types.js';
import {
  createBackoffCalculator,
  formatDelay,
  sleep,
} from './backoff.js';
import { getLogger } from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY POLICY IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export class RetryPolicyImpl implements RetryPolicy {
  private readonly config: RetryConfig;
  private readonly backoff: BackoffCalculator;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly logger = getLogger({ component: 'retry' });

  constructor(
    config: Partial<RetryConfig> = {},
    wait: (ms: number) => Promise<void> = sleep,
    random?: () => number
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.backoff = createBackoffCalculator(this.config, random);
    this.wait = wait;
  }

  getConfig(): RetryConfig {
    return this.config;
  }

  /**
   * Run fn until it resolves, throwing RetryExhaustedError when attempts run
   * out or an error is not retryable.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>): Promise<T> {
    const errors: Error[] = [];

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        const value = await fn(attempt);
        if (attempt > 1) {
          this.logger.debug('Retry succeeded', { attempt });
        }
        return value;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        errors.push(err);

        if (this.config.isRetryable && !this.config.isRetryable(err, attempt)) {
          this.logger.warn('Non-retryable error', { attempt, error: err.message });
          throw new RetryExhaustedError(attempt, errors, 'non_retryable');
        }

        if (attempt >= this.config.maxAttempts) {
          break;
        }

        const delayMs = this.backoff.calculate(attempt);
        this.logger.debug('Retrying', {
          attempt,
          maxAttempts: this.config.maxAttempts,
          error: err.message,
          delay: formatDelay(delayMs),
        });
        this.config.onRetry?.({ attempt, maxAttempts: this.config.maxAttempts, error: err, delayMs });

        await this.wait(delayMs);
      }
    }

    this.logger.warn('Retry exhausted', { attempts: errors.length });
    throw new RetryExhaustedError(errors.length, errors, 'max_attempts');
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export function createRetryPolicy(
  config?: Partial<RetryConfig>,
  wait?: (ms: number) => Promise<void>,
  random?: () => number
): RetryPolicy {
  return new RetryPolicyImpl(config, wait, random);
}
