// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Capped Exponential Delay with Additive Jitter
// ═══════════════════════════════════════════════════════════════════════════════
//
// delay(attempt) = min(maxDelayMs, initialDelayMs * multiplier^(attempt-1))
//                  + random() * that * jitterRatio
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { BackoffOptions } from './types.js';

export class ExponentialBackoff {
  private readonly options: BackoffOptions;
  private readonly random: () => number;

  constructor(options: BackoffOptions) {
    this.options = options;
    this.random = options.random ?? Math.random;
  }

  /**
   * Delay before the retry that follows failed attempt `attempt` (1-based).
   */
  calculate(attempt: number): number {
    const { initialDelayMs, maxDelayMs, backoffMultiplier, jitterRatio } = this.options;
    const capped = Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
    return capped + this.random() * capped * jitterRatio;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// UTILITY FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format delay for logging.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  } else {
    return `${(ms / 60000).toFixed(1)}m`;
  }
}
