// ═══════════════════════════════════════════════════════════════════════════════
// SOURCES — Source List Assembly and Source-Quality Assessment
// ═══════════════════════════════════════════════════════════════════════════════

import { isQuestionableSource, isTrustedSource, sourceDomain } from '../services/search/reliability.js';
import { dedupe, clampConfidence, encyclopediaItems, webItems } from './types.js';
import type { EvidenceBundle, VerificationAnalysis } from './types.js';

export const ENCYCLOPEDIA_SOURCE = 'Wikipedia';
export const PLACEHOLDER_SOURCE = 'LLM analysis based on content';

// ─────────────────────────────────────────────────────────────────────────────────
// ASSEMBLY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Web URLs in evidence order, then `Wikipedia` when encyclopedia evidence
 * was found. A single placeholder when there is no evidence at all.
 */
export function assembleSources(bundle: EvidenceBundle): string[] {
  const sources = webItems(bundle).map((item) => item.locator);

  if (encyclopediaItems(bundle).length > 0) {
    sources.push(ENCYCLOPEDIA_SOURCE);
  }

  return sources.length > 0 ? dedupe(sources) : [PLACEHOLDER_SOURCE];
}

// ─────────────────────────────────────────────────────────────────────────────────
// QUALITY
// ─────────────────────────────────────────────────────────────────────────────────

export interface SourceQuality {
  /** 0.5 baseline, raised by trusted and lowered by questionable sources */
  readonly score: number;
  readonly totalSources: number;
  readonly trustedSources: number;
  readonly questionableSources: number;
  readonly distinctDomains: number;
  readonly summary: string;
}

export const NO_SOURCES_SUMMARY = 'No sources provided for evaluation.';

/**
 * Score the sources cited across all analyses. Informational: the verdict
 * never depends on it.
 *
 *   diversity = min(1, distinctDomains / max(1, analyses))
 *   score     = clamp(0.5 + (trusted - questionable) / total * diversity)
 */
export function assessSourceQuality(analyses: readonly VerificationAnalysis[]): SourceQuality {
  const sources = analyses
    .flatMap((analysis) => analysis.sources)
    .filter((source) => source !== PLACEHOLDER_SOURCE);

  if (sources.length === 0) {
    return {
      score: 0,
      totalSources: 0,
      trustedSources: 0,
      questionableSources: 0,
      distinctDomains: 0,
      summary: NO_SOURCES_SUMMARY,
    };
  }

  const total = sources.length;
  const trusted = sources.filter(isTrustedSource).length;
  const questionable = sources.filter(isQuestionableSource).length;
  const domains = new Set(sources.map(sourceDomain)).size;

  const diversity = Math.min(1, domains / Math.max(1, analyses.length));
  const score = clampConfidence(0.5 + ((trusted - questionable) / total) * diversity);

  return {
    score,
    totalSources: total,
    trustedSources: trusted,
    questionableSources: questionable,
    distinctDomains: domains,
    summary:
      `Evaluated ${total} sources from ${domains} domains. ` +
      `Found ${trusted} trusted sources and ${questionable} potentially questionable ones. ` +
      `Source diversity factor: ${diversity.toFixed(2)}.`,
  };
}
