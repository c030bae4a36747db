// ═══════════════════════════════════════════════════════════════════════════════
// RETRY POLICY TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy } from '../policy.js';
import type { RetryConfig } from '../types.js';

const noSleep = vi.fn(async (_ms: number) => undefined);

function policy(overrides: Partial<RetryConfig> = {}): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: 2,
    initialDelayMs: 100,
    maxDelayMs: 1000,
    backoffMultiplier: 2,
    jitterRatio: 0.1,
    random: () => 0,
    isRetryable: (error) => error instanceof Error && error.message.includes('429'),
    sleep: noSleep,
    ...overrides,
  });
}

describe('RetryPolicy', () => {
  it('should return the first successful value', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('429 too many requests'))
      .mockResolvedValueOnce('done');

    const result = await policy().executeWithResult(fn);

    expect(result).toEqual({ success: true, value: 'done', attempts: 2 });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should stop immediately on non-retryable errors', async () => {
    const failure = new Error('401 unauthorized');
    const fn = vi.fn().mockRejectedValue(failure);

    const result = await policy().executeWithResult(fn);

    expect(result).toEqual({ success: false, error: failure, attempts: 1, reason: 'non_retryable' });
  });

  it('should make maxAttempts retries after the first call', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('429'));

    const result = await policy().executeWithResult(fn);

    expect(result).toMatchObject({ success: false, attempts: 3, reason: 'max_attempts' });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should wrap non-Error rejections', async () => {
    const result = await policy({ isRetryable: () => false }).executeWithResult(() => Promise.reject('weird'));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('weird');
    }
  });

  it('should sleep for the computed or overridden delay', async () => {
    const sleeps: number[] = [];
    const fn = vi.fn().mockRejectedValue(new Error('429'));

    await policy({
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      retryDelayMs: (_error, attempt, computed) => (attempt === 1 ? 5000 : computed),
    }).executeWithResult(fn);

    expect(sleeps).toEqual([5000, 200]);
  });

  it('should report each retry before sleeping', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(new Error('429'));

    await policy({ maxAttempts: 1, onRetry }).executeWithResult(fn);

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, maxAttempts: 1, delayMs: 100 });
  });
});
