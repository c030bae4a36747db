// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH TYPES — Search Provider Interfaces
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// SEARCH RESULT
// ─────────────────────────────────────────────────────────────────────────────────

export interface SearchResult {
  readonly title: string;
  readonly url: string;
  /** Page content excerpt (web) or article snippet (encyclopedia), plain text */
  readonly snippet: string;
  readonly publishedAt?: string;
  readonly score?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SEARCH RESPONSE
// ─────────────────────────────────────────────────────────────────────────────────

export interface SearchResponse {
  readonly query: string;
  readonly results: readonly SearchResult[];
  readonly retrievedAt: string;
  readonly provider: string;
  readonly success: boolean;
  readonly error?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SEARCH OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface SearchOptions {
  readonly maxResults?: number;
  readonly timeoutMs?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SEARCH PROVIDER INTERFACE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Providers never throw from `search`: failures come back as
 * `success: false` with an error message.
 */
export interface SearchProvider {
  readonly name: string;
  isAvailable(): boolean;
  search(query: string, options?: SearchOptions): Promise<SearchResponse>;
}

/**
 * Raised inside providers for HTTP and payload failures; converted to a
 * failed SearchResponse before leaving the provider.
 */
export class SearchProviderError extends Error {
  readonly name = 'SearchProviderError';
  readonly code = 'PROVIDER_ERROR';
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(`${provider}: ${message}`);
    this.provider = provider;
    this.status = status;
  }
}

export function failedResponse(provider: string, query: string, error: unknown): SearchResponse {
  return {
    query,
    results: [],
    retrievedAt: new Date().toISOString(),
    provider,
    success: false,
    error: error instanceof Error ? error.message : String(error),
  };
}
