// ═══════════════════════════════════════════════════════════════════════════════
// RATE LIMITER — Per-Service Pacing, Cooldown, Quota and Backoff
// ═══════════════════════════════════════════════════════════════════════════════
//
// One instance per external service, injected into that service's client.
// Every attempt reserves a start slot synchronously before waiting, so
// concurrent callers are spaced by minIntervalMs and all of them honour a
// cooldown set by any throttled call.
//
// Retry delay after a throttled attempt:
//   provider hint (seconds) + 2s buffer, or
//   min(maxBackoffMs, baseDelayMs * 2^attempt) + up to 10% jitter
//
// ═══════════════════════════════════════════════════════════════════════════════

import { RetryPolicy, sleep as defaultSleep, formatDelay } from '../retry/index.js';
import { getLogger, type ILogger } from '../../observability/logging/index.js';
import { RateLimitExceededError, QuotaExceededError } from './errors.js';
import {
  isRateLimitError,
  extractRetryAfterSeconds,
  RETRY_AFTER_BUFFER_MS,
} from './retry-after.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface RateLimiterOptions {
  /** Service name used in logs and errors */
  readonly name: string;

  /** Minimum spacing between attempt start times */
  readonly minIntervalMs?: number;

  readonly baseDelayMs?: number;

  /** Retries after the first attempt */
  readonly maxRetries?: number;

  readonly maxBackoffMs?: number;

  /** Calls per UTC day; unlimited when absent */
  readonly dailyQuota?: number;

  readonly jitterRatio?: number;

  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
}

export interface RateLimiterStats {
  readonly name: string;
  readonly totalCalls: number;
  readonly failedCalls: number;
  readonly rateLimitedCalls: number;
  readonly callsToday: number;
  /** Epoch ms until which new attempts wait; 0 when never throttled */
  readonly cooldownUntil: number;
}

/**
 * Contract for anything that runs a call under a limiter.
 */
export interface CallLimiter {
  callWithBackoff<T>(fn: () => Promise<T>): Promise<T>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RATE LIMITER
// ─────────────────────────────────────────────────────────────────────────────────

export class RateLimiter implements CallLimiter {
  readonly name: string;

  private readonly minIntervalMs: number;
  private readonly dailyQuota: number | undefined;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly policy: RetryPolicy;
  private readonly logger: ILogger;

  private nextSlotAt = 0;
  private cooldownUntil = 0;
  private quotaDay = '';
  private callsToday = 0;
  private totalCalls = 0;
  private failedCalls = 0;
  private rateLimitedCalls = 0;

  constructor(options: RateLimiterOptions) {
    this.name = options.name;
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.dailyQuota = options.dailyQuota;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = getLogger({ component: 'rate-limit', context: { service: options.name } });

    const baseDelayMs = options.baseDelayMs ?? 1000;

    this.policy = new RetryPolicy({
      maxAttempts: options.maxRetries ?? 3,
      // Retry n waits base * 2^n, so the first retry starts at base * 2
      initialDelayMs: baseDelayMs * 2,
      maxDelayMs: options.maxBackoffMs ?? 60000,
      backoffMultiplier: 2,
      jitterRatio: options.jitterRatio ?? 0.1,
      random: options.random,
      sleep: this.sleep,
      isRetryable: (error) => !(error instanceof QuotaExceededError) && isRateLimitError(error),
      retryDelayMs: (error, _attempt, computed) => this.retryDelay(error, computed),
      onRetry: (event) => {
        this.logger.warn('Rate limited, backing off', {
          attempt: event.attempt,
          maxRetries: event.maxAttempts,
          delay: formatDelay(event.delayMs),
          error: event.error.message,
        });
      },
    });
  }

  /**
   * Run `fn` under pacing and quota, retrying throttling errors with backoff.
   * Other errors are rethrown unchanged; exhausted retries throw
   * RateLimitExceededError.
   */
  async callWithBackoff<T>(fn: () => Promise<T>): Promise<T> {
    const result = await this.policy.executeWithResult(() => this.attempt(fn));

    if (result.success) {
      return result.value;
    }

    if (result.reason === 'non_retryable') {
      throw result.error;
    }

    this.logger.error('Rate limit retries exhausted', result.error, { attempts: result.attempts });
    throw new RateLimitExceededError(this.name, result.attempts, result.error);
  }

  /**
   * Milliseconds a call started now would wait before running.
   */
  getWaitTimeMs(): number {
    return Math.max(0, this.nextSlotAt - this.now(), this.cooldownUntil - this.now());
  }

  /**
   * Hold every caller back for at least `ms`.
   */
  setCooldown(ms: number): void {
    this.cooldownUntil = Math.max(this.cooldownUntil, this.now() + ms);
  }

  getStats(): RateLimiterStats {
    this.rollQuotaDay();
    return {
      name: this.name,
      totalCalls: this.totalCalls,
      failedCalls: this.failedCalls,
      rateLimitedCalls: this.rateLimitedCalls,
      callsToday: this.callsToday,
      cooldownUntil: this.cooldownUntil,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // INTERNALS
  // ─────────────────────────────────────────────────────────────────────────────

  private async attempt<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireSlot();

    // No await between the quota check and the bookkeeping
    this.consumeQuota();
    this.totalCalls++;

    try {
      return await fn();
    } catch (error) {
      this.failedCalls++;
      if (isRateLimitError(error)) {
        this.rateLimitedCalls++;
      }
      throw error;
    }
  }

  private async acquireSlot(): Promise<void> {
    const now = this.now();
    const start = Math.max(now, this.nextSlotAt, this.cooldownUntil);
    this.nextSlotAt = start + this.minIntervalMs;

    const waitMs = start - now;
    if (waitMs > 0) {
      this.logger.debug('Waiting for slot', { waitMs });
      await this.sleep(waitMs);
    }
  }

  private consumeQuota(): void {
    if (this.dailyQuota === undefined) {
      return;
    }
    this.rollQuotaDay();
    if (this.callsToday >= this.dailyQuota) {
      throw new QuotaExceededError(this.name, this.dailyQuota);
    }
    this.callsToday++;
  }

  private rollQuotaDay(): void {
    const day = new Date(this.now()).toISOString().slice(0, 10);
    if (day !== this.quotaDay) {
      this.quotaDay = day;
      this.callsToday = 0;
    }
  }

  private retryDelay(error: unknown, computedDelayMs: number): number {
    const hintSeconds = extractRetryAfterSeconds(error);
    const delayMs = hintSeconds !== undefined
      ? hintSeconds * 1000 + RETRY_AFTER_BUFFER_MS
      : computedDelayMs;

    this.setCooldown(delayMs);
    return delayMs;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// PASS-THROUGH
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Limiter that runs calls directly. For clients used without pacing.
 */
export const unlimited: CallLimiter = {
  callWithBackoff: <T>(fn: () => Promise<T>): Promise<T> => fn(),
};
