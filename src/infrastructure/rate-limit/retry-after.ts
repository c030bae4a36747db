// ═══════════════════════════════════════════════════════════════════════════════
// RETRY-AFTER — Rate-Limit Detection and Provider Delay Hints
// ═══════════════════════════════════════════════════════════════════════════════

export const RATE_LIMIT_TERMS = [
  '429',
  'exceeded',
  'quota',
  'rate limit',
  'too many requests',
  'capacity',
] as const;

/** Added to every provider-supplied delay */
export const RETRY_AFTER_BUFFER_MS = 2000;

const HINT_PATTERNS: readonly RegExp[] = [
  /retry_delay\s*\{\s*seconds:\s*(\d+)/i,
  /retry-after:\s*(\d+)/i,
  /retry after\s+(\d+)\s*s/i,
  /seconds:\s*(\d+)/i,
];

function readProperty(value: unknown, key: string): unknown {
  if (value !== null && typeof value === 'object' && key in value) {
    return Object.getOwnPropertyDescriptor(value, key)?.value;
  }
  return undefined;
}

export function errorText(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name} ${error.message}`;
  }
  return String(error);
}

/**
 * True for errors that signal throttling: HTTP 429 or a provider message
 * naming a rate limit, quota or capacity.
 */
export function isRateLimitError(error: unknown): boolean {
  if (readProperty(error, 'status') === 429) {
    return true;
  }
  const text = errorText(error).toLowerCase();
  return RATE_LIMIT_TERMS.some((term) => text.includes(term));
}

/**
 * Seconds the provider asked us to wait, from a `retryAfter` property or the
 * error text. Undefined when there is no hint.
 */
export function extractRetryAfterSeconds(error: unknown): number | undefined {
  const property = readProperty(error, 'retryAfter');
  if (typeof property === 'number' && Number.isFinite(property) && property >= 0) {
    return property;
  }

  const header = readProperty(readProperty(error, 'headers'), 'retry-after');
  if (typeof header === 'string' && /^\d+$/.test(header.trim())) {
    return parseInt(header, 10);
  }

  const text = errorText(error);
  for (const pattern of HINT_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1] !== undefined) {
      return parseInt(match[1], 10);
    }
  }
  return undefined;
}
