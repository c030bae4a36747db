// ═══════════════════════════════════════════════════════════════════════════════
// RATE LIMIT ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Retries against a rate-limited service ran out.
 */
export class RateLimitExceededError extends Error {
  readonly name = 'RateLimitExceededError';
  readonly code = 'RATE_LIMITED';
  readonly service: string;
  readonly attempts: number;

  constructor(service: string, attempts: number, cause: Error) {
    super(`Rate limit exceeded for ${service} after ${attempts} attempts: ${cause.message}`);
    this.service = service;
    this.attempts = attempts;
    this.cause = cause;
  }
}

/**
 * The configured daily call budget for a service is spent.
 */
export class QuotaExceededError extends Error {
  readonly name = 'QuotaExceededError';
  readonly code = 'QUOTA_EXCEEDED';
  readonly service: string;
  readonly quota: number;

  constructor(service: string, quota: number) {
    super(`Daily quota of ${quota} calls exhausted for ${service}`);
    this.service = service;
    this.quota = quota;
  }
}
