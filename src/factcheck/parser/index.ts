// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE PARSER — Verifier Text to VerificationAnalysis
// ═══════════════════════════════════════════════════════════════════════════════
//
// Pure: identical input gives identical output, nothing here throws on
// malformed text. Malformed or missing sections fall back to
// UNABLE_TO_VERIFY, derived confidence and synthesized reasoning.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { ConfidencePrecedence } from '../../config/schema.js';
import { getLogger } from '../../observability/logging/index.js';
import { createAnalysis, type VerificationAnalysis } from '../types.js';
import { resolveConfidence, extractExplicitConfidence, voteConfidence } from './confidence.js';
import { splitListItems } from './lists.js';
import { segmentSections, sectionLines, sectionText } from './sections.js';
import { parseSourceEvaluations } from './source-evaluations.js';
import { findInlineStatus, normalizeStatus, type NormalizedStatus } from './status.js';

const logger = getLogger({ component: 'parser' });

export const EMPTY_RESPONSE_MESSAGE = 'Empty response from language model';

export interface ParseOptions {
  readonly confidencePrecedence?: ConfidencePrecedence;
}

function detectStatus(statusLines: readonly string[], fullText: string): NormalizedStatus {
  const first = statusLines[0];
  if (first !== undefined) {
    return normalizeStatus(first);
  }

  const inline = findInlineStatus(fullText);
  return inline !== undefined
    ? normalizeStatus(inline)
    : { status: 'UNABLE_TO_VERIFY', matched: false };
}

export function parseVerificationResponse(
  raw: string,
  questionText: string,
  options: ParseOptions = {}
): VerificationAnalysis {
  const text = raw.trim();

  if (!text) {
    logger.warn('Empty verifier response', { question: questionText.slice(0, 80) });
    return createAnalysis({
      status: 'ERROR',
      confidence: 0,
      reasoning: EMPTY_RESPONSE_MESSAGE,
      error: EMPTY_RESPONSE_MESSAGE,
    });
  }

  const segmented = segmentSections(text);
  const hasHeadings = segmented.sections.size > 0;

  const detected = detectStatus(sectionLines(segmented, 'status'), text);
  const status = hasHeadings || detected.matched ? detected.status : 'UNABLE_TO_VERIFY';

  const sourceEvaluations = parseSourceEvaluations(sectionLines(segmented, 'sourceEvaluations'));

  const confidence = resolveConfidence(
    {
      status,
      explicit: extractExplicitConfidence(sectionText(segmented, 'confidence'), text),
      implied: detected.impliedConfidence,
      votes: voteConfidence(status, sourceEvaluations),
    },
    options.confidencePrecedence
  );

  // Without headings the whole text is the reasoning
  const reasoning = hasHeadings
    ? sectionLines(segmented, 'reasoning').join(' ')
    : text;

  const analysis = createAnalysis({
    status,
    confidence: confidence.value,
    supportingEvidence: splitListItems(sectionLines(segmented, 'supporting')),
    contradictingEvidence: splitListItems(sectionLines(segmented, 'contradicting')),
    reasoning,
    evidenceGaps: splitListItems(sectionLines(segmented, 'gaps')),
    recommendations: splitListItems(sectionLines(segmented, 'recommendations')),
    sourceEvaluations,
  });

  logger.debug('Parsed verifier response', {
    question: questionText.slice(0, 80),
    status: analysis.status,
    confidence: analysis.confidence,
    confidenceBasis: confidence.basis,
    sections: [...segmented.sections.keys()],
  });

  return analysis;
}

export { SECTION_HEADINGS, SectionScanner, matchHeading, segmentSections, type SectionKey } from './sections.js';
export { splitListItems, stripListMarker, isListMarker } from './lists.js';
export { STATUS_SYNONYMS, normalizeStatus, statusFromConfidence, parseBareNumber } from './status.js';
export {
  DEFAULT_CONFIDENCE,
  resolveConfidence,
  extractExplicitConfidence,
  voteConfidence,
  type ConfidenceBasis,
} from './confidence.js';
export { parseSourceEvaluation, parseSourceEvaluations } from './source-evaluations.js';
