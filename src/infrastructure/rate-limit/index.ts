// ═══════════════════════════════════════════════════════════════════════════════
// RATE LIMIT MODULE INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export {
  RateLimiter,
  unlimited,
  type CallLimiter,
  type RateLimiterOptions,
  type RateLimiterStats,
} from './limiter.js';

export {
  RateLimitExceededError,
  QuotaExceededError,
} from './errors.js';

export {
  RATE_LIMIT_TERMS,
  RETRY_AFTER_BUFFER_MS,
  isRateLimitError,
  extractRetryAfterSeconds,
} from './retry-after.js';
