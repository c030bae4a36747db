// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Retry Policy Configuration and Results
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface BackoffOptions {
  /** Delay before the first retry */
  readonly initialDelayMs: number;

  /** Ceiling for the exponential part; jitter is added on top */
  readonly maxDelayMs: number;

  readonly backoffMultiplier: number;

  /** Fraction of the capped delay added at most as jitter */
  readonly jitterRatio: number;

  /** Random source in [0, 1); replaced in tests */
  readonly random?: () => number;
}

export interface RetryConfig extends BackoffOptions {
  /** Retries after the first attempt */
  readonly maxAttempts: number;

  readonly isRetryable: (error: unknown, attempt: number) => boolean;

  /**
   * Override the computed delay, e.g. with a provider's retry-after hint.
   * Receives the backoff the policy would otherwise use.
   */
  readonly retryDelayMs?: (error: unknown, attempt: number, computedDelayMs: number) => number;

  /** Called before each retry sleep */
  readonly onRetry?: (event: RetryEvent) => void;

  /** Delay implementation; replaced in tests */
  readonly sleep?: (ms: number) => Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS AND RESULTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryEvent {
  /** Attempt that just failed (1-based) */
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly error: Error;
  readonly delayMs: number;
}

export type RetryFailureReason = 'max_attempts' | 'non_retryable';

export type RetryResult<T> =
  | { readonly success: true; readonly value: T; readonly attempts: number }
  | {
      readonly success: false;
      readonly error: Error;
      readonly attempts: number;
      readonly reason: RetryFailureReason;
    };
