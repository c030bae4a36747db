// ═══════════════════════════════════════════════════════════════════════════════
// TAVILY SEARCH PROVIDER — Web Search via the Tavily API
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { unlimited, type CallLimiter } from '../../infrastructure/rate-limit/index.js';
import { getLogger } from '../../observability/logging/index.js';
import {
  SearchProviderError,
  failedResponse,
  type SearchOptions,
  type SearchProvider,
  type SearchResponse,
  type SearchResult,
} from './types.js';

const logger = getLogger({ component: 'tavily' });

export const TAVILY_ENDPOINT = 'https://api.tavily.com/search';

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(''),
      url: z.string(),
      content: z.string().default(''),
      score: z.number().optional(),
      published_date: z.string().optional(),
    })
  ).default([]),
});

// ─────────────────────────────────────────────────────────────────────────────────
// PROVIDER
// ─────────────────────────────────────────────────────────────────────────────────

export interface TavilySearchProviderOptions {
  readonly apiKey?: string;
  readonly limiter?: CallLimiter;
  readonly defaultTimeoutMs?: number;
  readonly searchDepth?: 'basic' | 'advanced';
}

export class TavilySearchProvider implements SearchProvider {
  readonly name = 'tavily';

  private readonly apiKey: string | undefined;
  private readonly limiter: CallLimiter;
  private readonly defaultTimeoutMs: number;
  private readonly searchDepth: 'basic' | 'advanced';

  constructor(options: TavilySearchProviderOptions = {}) {
    this.apiKey = options.apiKey;
    this.limiter = options.limiter ?? unlimited;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 10000;
    this.searchDepth = options.searchDepth ?? 'advanced';
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      return failedResponse(this.name, query, 'Tavily API key not configured');
    }

    try {
      const results = await this.limiter.callWithBackoff(() =>
        this.request(apiKey, query, options.maxResults ?? 5, options.timeoutMs ?? this.defaultTimeoutMs)
      );

      logger.debug('Web search completed', { query: query.slice(0, 80), results: results.length });

      return {
        query,
        results,
        retrievedAt: new Date().toISOString(),
        provider: this.name,
        success: true,
      };
    } catch (error) {
      logger.warn('Web search failed', { query: query.slice(0, 80), error: String(error) });
      return failedResponse(this.name, query, error);
    }
  }

  private async request(
    apiKey: string,
    query: string,
    maxResults: number,
    timeoutMs: number
  ): Promise<SearchResult[]> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(TAVILY_ENDPOINT, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          query,
          search_depth: this.searchDepth,
          max_results: maxResults,
          include_answer: false,
          include_raw_content: false,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new SearchProviderError(this.name, `HTTP ${response.status} ${response.statusText}`, response.status);
      }

      const parsed = TavilyResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new SearchProviderError(this.name, 'Unexpected response shape');
      }

      return parsed.data.results.slice(0, maxResults).map((r) => ({
        title: r.title,
        url: r.url,
        snippet: r.content,
        ...(r.score !== undefined && { score: r.score }),
        ...(r.published_date !== undefined && { publishedAt: r.published_date }),
      }));
    } finally {
      clearTimeout(timer);
    }
  }
}
