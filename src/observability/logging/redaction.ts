// ═══════════════════════════════════════════════════════════════════════════════
// REDACTION — Secret and PII Scrubbing for Log Entries
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// PATTERNS
// ─────────────────────────────────────────────────────────────────────────────────

export interface RedactionPattern {
  readonly pattern: RegExp;
  readonly replacement: string;
}

export const DEFAULT_PATTERNS: readonly RedactionPattern[] = [
  // Email
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  // Provider API keys (sk-..., tvly-...)
  { pattern: /\b(?:sk|tvly)-[A-Za-z0-9_-]{8,}\b/g, replacement: '[API_KEY]' },
  // Bearer credentials
  { pattern: /Bearer\s+[A-Za-z0-9._~+/=-]+/g, replacement: 'Bearer [REDACTED]' },
];

const SENSITIVE_KEY_TERMS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

export interface RedactionOptions {
  /** Extra string patterns */
  readonly patterns?: readonly RedactionPattern[];
  /** Extra key fragments whose values are always replaced */
  readonly sensitiveKeys?: readonly string[];
  readonly maxDepth?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

export function redactString(text: string, patterns: readonly RedactionPattern[] = DEFAULT_PATTERNS): string {
  let result = text;
  for (const { pattern, replacement } of patterns) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

export function isSensitiveKey(key: string, extra: readonly string[] = []): boolean {
  const lowerKey = key.toLowerCase();
  return [...SENSITIVE_KEY_TERMS, ...extra].some((term) => lowerKey.includes(term));
}

function redactValue(value: unknown, options: RedactionOptions, depth: number): unknown {
  if (depth > (options.maxDepth ?? 5)) return '[MAX_DEPTH]';

  if (typeof value === 'string') {
    return redactString(value, [...DEFAULT_PATTERNS, ...(options.patterns ?? [])]);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, options, depth + 1));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = isSensitiveKey(key, options.sensitiveKeys)
        ? '[REDACTED]'
        : redactValue(inner, options, depth + 1);
    }
    return result;
  }

  return value;
}

/**
 * Redact a log entry. Sensitive keys are replaced wholesale; strings are
 * scrubbed with the pattern list.
 */
export function redact(entry: Record<string, unknown>, options: RedactionOptions = {}): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    result[key] = isSensitiveKey(key, options.sensitiveKeys)
      ? '[REDACTED]'
      : redactValue(value, options, 1);
  }
  return result;
}
