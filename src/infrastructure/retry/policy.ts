// ═══════════════════════════════════════════════════════════════════════════════
// RETRY POLICY — Retry Loop over an Async Call
// ═══════════════════════════════════════════════════════════════════════════════

import type { RetryConfig, RetryResult, RetryFailureReason } from './types.js';
import { ExponentialBackoff, sleep, formatDelay } from './backoff.js';
import { getLogger } from '../../observability/logging/index.js';

export class RetryPolicy {
  private readonly config: RetryConfig;
  private readonly backoff: ExponentialBackoff;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger = getLogger({ component: 'retry' });

  constructor(config: RetryConfig) {
    this.config = config;
    this.backoff = new ExponentialBackoff(config);
    this.sleep = config.sleep ?? sleep;
  }

  /**
   * Run `fn` until it resolves, a non-retryable error is thrown or
   * `maxAttempts` retries are used up. Never rejects.
   */
  async executeWithResult<T>(fn: () => Promise<T>): Promise<RetryResult<T>> {
    let attempt = 0;

    while (true) {
      attempt++;

      try {
        const value = await fn();
        if (attempt > 1) {
          this.logger.debug('Retry succeeded', { attempt });
        }
        return { success: true, value, attempts: attempt };
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));

        if (!this.config.isRetryable(error, attempt)) {
          return this.failure(err, attempt, 'non_retryable');
        }
        if (attempt > this.config.maxAttempts) {
          return this.failure(err, attempt, 'max_attempts');
        }

        const computed = this.backoff.calculate(attempt);
        const delayMs = this.config.retryDelayMs?.(error, attempt, computed) ?? computed;

        this.logger.debug('Retrying', { attempt, error: err.message, delay: formatDelay(delayMs) });
        this.config.onRetry?.({ attempt, maxAttempts: this.config.maxAttempts, error: err, delayMs });
        await this.sleep(delayMs);
      }
    }
  }

  private failure<T>(error: Error, attempts: number, reason: RetryFailureReason): RetryResult<T> {
    return { success: false, error, attempts, reason };
  }
}
