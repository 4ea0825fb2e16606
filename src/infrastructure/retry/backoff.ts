// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Exponential Backoff with Equal Jitter
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  BackoffCalculator,
  RetryConfig,
} from './types.js';

type BackoffOptions = Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>;

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF CALCULATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class BackoffCalculatorImpl implements BackoffCalculator {
  private readonly options: BackoffOptions;
  private readonly random: () => number;

  constructor(options: BackoffOptions, random: () => number = Math.random) {
    this.options = options;
    this.random = random;
  }

  /**
   * Delay for the given failed attempt (1-based), clamped to maxDelayMs.
   * Jitter keeps it between half and all of the exponential delay.
   */
  calculate(attempt: number): number {
    const { initialDelayMs, maxDelayMs, backoffMultiplier } = this.options;
    const base = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);

    return Math.min(base / 2 + this.random() * base / 2, maxDelayMs);
  }
}

export function createBackoffCalculator(options: BackoffOptions, random?: () => number): BackoffCalculator {
  return new BackoffCalculatorImpl(options, random);
}

// ─────────────────────────────────────────────────────────────────────────────────
// UTILITIES
// ─────────────────────────────────────────────────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}
