// ═══════════════════════════════════════════════════════════════════════════════
// EVIDENCE GATHERER — Web and Encyclopedia Lookups for One Question
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import type { SearchProvider, SearchResult } from '../services/search/types.js';
import type { EvidenceBundle, EvidenceItem, EvidenceOrigin } from './types.js';

const logger = getLogger({ component: 'evidence' });

export interface EvidenceGathererOptions {
  readonly webMaxResults?: number;
  readonly encyclopediaMaxResults?: number;
  readonly timeoutMs?: number;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function toItem(origin: EvidenceOrigin, result: SearchResult): EvidenceItem {
  return {
    origin,
    locator: origin === 'web' ? result.url : result.title,
    excerpt: collapseWhitespace(result.snippet),
  };
}

export class EvidenceGatherer {
  private readonly webMaxResults: number;
  private readonly encyclopediaMaxResults: number;
  private readonly timeoutMs: number | undefined;

  constructor(
    private readonly web: SearchProvider,
    private readonly encyclopedia: SearchProvider,
    options: EvidenceGathererOptions = {}
  ) {
    this.webMaxResults = options.webMaxResults ?? 5;
    this.encyclopediaMaxResults = options.encyclopediaMaxResults ?? 3;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Both lookups run in parallel; either failing leaves its part empty.
   * Web items come first.
   */
  async gather(question: string): Promise<EvidenceBundle> {
    const [webResults, encyclopediaResults] = await Promise.all([
      this.lookup(this.web, question, this.webMaxResults),
      this.lookup(this.encyclopedia, question, this.encyclopediaMaxResults),
    ]);

    const items = [
      ...webResults.map((result) => toItem('web', result)),
      ...encyclopediaResults.map((result) => toItem('encyclopedia', result)),
    ];

    logger.debug('Evidence gathered', {
      question: question.slice(0, 80),
      web: webResults.length,
      encyclopedia: encyclopediaResults.length,
    });

    return { question, items };
  }

  private async lookup(
    provider: SearchProvider,
    question: string,
    maxResults: number
  ): Promise<readonly SearchResult[]> {
    try {
      const response = await provider.search(question, { maxResults, timeoutMs: this.timeoutMs });
      if (!response.success) {
        logger.warn('Search returned no evidence', { provider: provider.name, error: response.error });
        return [];
      }
      return response.results.slice(0, maxResults);
    } catch (error) {
      logger.warn('Search failed', { provider: provider.name, error: String(error) });
      return [];
    }
  }
}
