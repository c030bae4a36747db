// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { ExponentialBackoff, formatDelay } from '../backoff.js';

describe('ExponentialBackoff', () => {
  it('should double delays when jitter draws zero', () => {
    const backoff = new ExponentialBackoff({
      initialDelayMs: 100,
      maxDelayMs: 10000,
      backoffMultiplier: 2,
      jitterRatio: 0.1,
      random: () => 0,
    });
    expect([1, 2, 3, 4].map((a) => backoff.calculate(a))).toEqual([100, 200, 400, 800]);
  });

  it('should add jitter on top of the ceiling', () => {
    const backoff = new ExponentialBackoff({
      initialDelayMs: 20000,
      maxDelayMs: 120000,
      backoffMultiplier: 2,
      jitterRatio: 0.1,
      random: () => 0.5,
    });
    // 20000 * 2^3 = 160000 -> capped 120000, plus 0.5 * 12000
    expect(backoff.calculate(4)).toBe(126000);
    expect(backoff.calculate(1)).toBe(21000);
  });

  it('should stay within the jitter band', () => {
    const backoff = new ExponentialBackoff({
      initialDelayMs: 1000,
      maxDelayMs: 3000,
      backoffMultiplier: 2,
      jitterRatio: 0.1,
    });
    for (let attempt = 1; attempt <= 6; attempt++) {
      const delay = backoff.calculate(attempt);
      const base = Math.min(1000 * 2 ** (attempt - 1), 3000);
      expect(delay).toBeGreaterThanOrEqual(base);
      expect(delay).toBeLessThanOrEqual(base * 1.1);
    }
  });
});

describe('formatDelay', () => {
  it('should pick a readable unit', () => {
    expect(formatDelay(250)).toBe('250ms');
    expect(formatDelay(1500)).toBe('1.5s');
    expect(formatDelay(90000)).toBe('1.5m');
  });
});
