// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE INDEX — Retry Policy Exports
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  BackoffOptions,
  RetryConfig,
  RetryEvent,
  RetryFailureReason,
  RetryResult,
} from './types.js';

export { ExponentialBackoff, sleep, formatDelay } from './backoff.js';

export { RetryPolicy } from './policy.js';
