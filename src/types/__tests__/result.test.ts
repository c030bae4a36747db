// ═══════════════════════════════════════════════════════════════════════════════
// RESULT TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { ok, err, isOk, isErr, unwrapOr, tryCatchAsync } from '../result.js';

describe('Result', () => {
  it('should narrow with the guards', () => {
    const good = ok(3);
    const bad = err('nope');
    expect(isOk(good)).toBe(true);
    expect(isErr(bad)).toBe(true);
    expect(unwrapOr(bad, 0)).toBe(0);
    expect(unwrapOr(good, 0)).toBe(3);
  });

  it('should capture rejections as Err', async () => {
    const result = await tryCatchAsync(async () => {
      throw new Error('boom');
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('boom');
    }
  });

  it('should wrap non-Error rejections', async () => {
    const result = await tryCatchAsync(() => Promise.reject('plain'));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('plain');
    }
  });
});
