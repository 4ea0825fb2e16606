// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TESTS — Backoff Calculation and Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import {
  BackoffCalculatorImpl,
  RetryExhaustedError,
  createRetryPolicy,
  formatDelay,
} from '../retry/index.js';

const noWait = async (_ms: number): Promise<void> => undefined;

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('BackoffCalculatorImpl', () => {
  const base = {
    initialDelayMs: 100,
    maxDelayMs: 250,
    backoffMultiplier: 2,
  } as const;

  const full = (): number => 1;

  it('should grow exponentially and clamp to the maximum', () => {
    const backoff = new BackoffCalculatorImpl(base, full);

    expect(backoff.calculate(1)).toBe(100);
    expect(backoff.calculate(2)).toBe(200);
    expect(backoff.calculate(3)).toBe(250);
  });

  it('should apply equal jitter between half and the full delay', () => {
    const low = new BackoffCalculatorImpl(base, () => 0);
    const middle = new BackoffCalculatorImpl(base, () => 0.5);

    expect(low.calculate(2)).toBe(100);
    expect(middle.calculate(2)).toBe(150);
  });
});

describe('formatDelay', () => {
  it('should format milliseconds and seconds', () => {
    expect(formatDelay(150)).toBe('150ms');
    expect(formatDelay(2500)).toBe('2.5s');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// POLICY TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('RetryPolicy', () => {
  it('should return the first successful result', async () => {
    const wait = vi.fn(noWait);
    const policy = createRetryPolicy({ maxAttempts: 3, initialDelayMs: 100 }, wait, () => 1);
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`connect ECONNREFUSED (${attempt})`);
      return 'connected';
    });

    await expect(policy.execute(fn)).resolves.toBe('connected');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait.mock.calls).toEqual([[100], [200]]);
  });

  it('should report each retry', async () => {
    const onRetry = vi.fn();
    const policy = createRetryPolicy({ maxAttempts: 2, initialDelayMs: 10, onRetry }, noWait, () => 1);

    await policy.execute(async attempt => {
      if (attempt === 1) throw new Error('flaky');
      return attempt;
    });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, maxAttempts: 2, delayMs: 10 });
  });

  it('should throw RetryExhaustedError after the last attempt', async () => {
    const policy = createRetryPolicy({ maxAttempts: 3 }, noWait);
    const failures = [new Error('first'), new Error('second'), new Error('third')];
    let call = 0;

    const error = await policy
      .execute(async () => {
        throw failures[call++];
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.reason).toBe('max_attempts');
      expect(error.allErrors).toEqual(failures);
      expect(error.cause).toBe(failures[2]);
      expect(error.message).toBe('Retry exhausted after 3 attempt(s): third');
    }
  });

  it('should stop at a non-retryable error', async () => {
    const wait = vi.fn(noWait);
    const policy = createRetryPolicy({ maxAttempts: 5, isRetryable: () => false }, wait);

    const error = await policy
      .execute(async () => {
        throw new Error('bad credentials');
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(1);
      expect(error.reason).toBe('non_retryable');
    }
    expect(wait).not.toHaveBeenCalled();
  });

  it('should wrap non-Error throws', async () => {
    const policy = createRetryPolicy({ maxAttempts: 1 }, noWait);

    const error = await policy
      .execute(async () => {
        throw 'socket closed';
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.allErrors[0]?.message).toBe('socket closed');
    }
  });
});
