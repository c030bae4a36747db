// ═══════════════════════════════════════════════════════════════════════════════
// WIKIPEDIA SEARCH PROVIDER — Encyclopedia Search via the MediaWiki API
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

const logger = getLogger({ component: 'wikipedia' });

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

const MediaWikiSearchSchema = z.object({
  query: z.object({
    search: z.array(
      z.object({
        title: z.string(),
        snippet: z.string().default(''),
        timestamp: z.string().optional(),
      })
    ).default([]),
  }).default({}),
});

// ─────────────────────────────────────────────────────────────────────────────────
// SNIPPET CLEANUP
// ─────────────────────────────────────────────────────────────────────────────────

const ENTITIES: Record<string, string> = {
  '&quot;': '"',
  '&#039;': "'",
  '&#39;': "'",
  '&apos;': "'",
  '&lt;': '<',
  '&gt;': '>',
  '&nbsp;': ' ',
  '&amp;': '&',
};

/**
 * Strip search-match markup and decode the common HTML entities.
 */
export function cleanSnippet(snippet: string): string {
  return snippet
    .replace(/<[^>]*>/g, '')
    .replace(/&(?:quot|#0?39|apos|lt|gt|nbsp|amp);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\s+/g, ' ')
    .trim();
}

export function articleUrl(title: string, lang: string = 'en'): string {
  return `https://${lang}.wikipedia.org/wiki/${encodeURIComponent(title.replace(/\s+/g, '_'))}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROVIDER
// ─────────────────────────────────────────────────────────────────────────────────

export interface WikipediaSearchProviderOptions {
  readonly lang?: string;
  readonly userAgent?: string;
  readonly limiter?: CallLimiter;
  readonly defaultTimeoutMs?: number;
}

export class WikipediaSearchProvider implements SearchProvider {
  readonly name = 'wikipedia';

  private readonly lang: string;
  private readonly userAgent: string;
  private readonly limiter: CallLimiter;
  private readonly defaultTimeoutMs: number;

  constructor(options: WikipediaSearchProviderOptions = {}) {
    this.lang = options.lang ?? 'en';
    this.userAgent = options.userAgent ?? 'veracity-engine/0.1 (fact-checking pipeline)';
    this.limiter = options.limiter ?? unlimited;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 10000;
  }

  isAvailable(): boolean {
    return true;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    try {
      const results = await this.limiter.callWithBackoff(() =>
        this.request(query, options.maxResults ?? 3, options.timeoutMs ?? this.defaultTimeoutMs)
      );

      logger.debug('Encyclopedia search completed', { query: query.slice(0, 80), results: results.length });

      return {
        query,
        results,
        retrievedAt: new Date().toISOString(),
        provider: this.name,
        success: true,
      };
    } catch (error) {
      logger.warn('Encyclopedia search failed', { query: query.slice(0, 80), error: String(error) });
      return failedResponse(this.name, query, error);
    }
  }

  buildSearchUrl(query: string, maxResults: number): string {
    const params = new URLSearchParams({
      action: 'query',
      list: 'search',
      srsearch: query,
      srlimit: String(maxResults),
      format: 'json',
      utf8: '1',
    });
    return `https://${this.lang}.wikipedia.org/w/api.php?${params.toString()}`;
  }

  private async request(query: string, maxResults: number, timeoutMs: number): Promise<SearchResult[]> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(this.buildSearchUrl(query, maxResults), {
        headers: {
          Accept: 'application/json',
          'User-Agent': this.userAgent,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new SearchProviderError(this.name, `HTTP ${response.status} ${response.statusText}`, response.status);
      }

      const parsed = MediaWikiSearchSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new SearchProviderError(this.name, 'Unexpected response shape');
      }

      return parsed.data.query.search.slice(0, maxResults).map((item) => ({
        title: item.title,
        url: articleUrl(item.title, this.lang),
        snippet: cleanSnippet(item.snippet),
        ...(item.timestamp !== undefined && { publishedAt: item.timestamp }),
      }));
    } finally {
      clearTimeout(timer);
    }
  }
}
