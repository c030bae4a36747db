// ═══════════════════════════════════════════════════════════════════════════════
// FACT-CHECK TYPES — Questions, Evidence, Analyses and Judgments
// ═══════════════════════════════════════════════════════════════════════════════
//
// Entities are readonly and built through the create* functions below, which
// enforce the clamped-confidence and closed-status invariants.
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// QUESTION
// ─────────────────────────────────────────────────────────────────────────────────

export interface Question {
  readonly text: string;
  /** Claim from the content the question targets, when known */
  readonly claim?: string;
}

export function createQuestion(text: string, claim?: string): Question {
  const trimmed = text.trim();
  return claim ? { text: trimmed, claim } : { text: trimmed };
}

// ─────────────────────────────────────────────────────────────────────────────────
// EVIDENCE
// ─────────────────────────────────────────────────────────────────────────────────

export type EvidenceOrigin = 'web' | 'encyclopedia';

export interface EvidenceItem {
  readonly origin: EvidenceOrigin;
  /** URL for web items, article title for encyclopedia items */
  readonly locator: string;
  readonly excerpt: string;
}

export interface EvidenceBundle {
  readonly question: string;
  readonly items: readonly EvidenceItem[];
}

export function webItems(bundle: EvidenceBundle): readonly EvidenceItem[] {
  return bundle.items.filter((item) => item.origin === 'web');
}

export function encyclopediaItems(bundle: EvidenceBundle): readonly EvidenceItem[] {
  return bundle.items.filter((item) => item.origin === 'encyclopedia');
}

// ─────────────────────────────────────────────────────────────────────────────────
// VERIFICATION STATUS
// ─────────────────────────────────────────────────────────────────────────────────

export const VERIFICATION_STATUSES = [
  'VERIFIED',
  'FALSE',
  'PARTIALLY_TRUE',
  'MISLEADING',
  'UNSUBSTANTIATED',
  'UNABLE_TO_VERIFY',
  'ERROR',
] as const;

export type VerificationStatus = typeof VERIFICATION_STATUSES[number];

/**
 * Lowercase words for a status, e.g. `partially true`.
 */
export function statusLabel(status: VerificationStatus): string {
  return status.toLowerCase().replace(/_/g, ' ');
}

// ─────────────────────────────────────────────────────────────────────────────────
// VERIFICATION ANALYSIS
// ─────────────────────────────────────────────────────────────────────────────────

export type SourceVerdict = 'YES' | 'NO';

export interface SourceEvaluation {
  readonly source: string;
  readonly verdict: SourceVerdict;
  readonly reason: string;
}

export interface VerificationAnalysis {
  readonly status: VerificationStatus;
  /** Always within [0, 1] */
  readonly confidence: number;
  readonly supportingEvidence: readonly string[];
  readonly contradictingEvidence: readonly string[];
  /** Never empty */
  readonly reasoning: string;
  readonly evidenceGaps: readonly string[];
  readonly recommendations: readonly string[];
  /** Deduplicated, first occurrence kept */
  readonly sources: readonly string[];
  readonly sourceEvaluations: readonly SourceEvaluation[];
  readonly error?: string;
}

export type AnalysisFields = Partial<VerificationAnalysis> & Pick<VerificationAnalysis, 'status'>;

export function clampConfidence(value: number, min: number = 0, max: number = 1): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}

export function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}

export function backfillReasoning(status: VerificationStatus): string {
  return `Based on the evidence, the claim is determined to be ${statusLabel(status)}.`;
}

export function createAnalysis(fields: AnalysisFields): VerificationAnalysis {
  const reasoning = fields.reasoning?.trim();

  return {
    status: fields.status,
    confidence: clampConfidence(fields.confidence ?? 0),
    supportingEvidence: [...(fields.supportingEvidence ?? [])],
    contradictingEvidence: [...(fields.contradictingEvidence ?? [])],
    reasoning: reasoning || backfillReasoning(fields.status),
    evidenceGaps: [...(fields.evidenceGaps ?? [])],
    recommendations: [...(fields.recommendations ?? [])],
    sources: dedupe(fields.sources ?? []),
    sourceEvaluations: [...(fields.sourceEvaluations ?? [])],
    ...(fields.error !== undefined && { error: fields.error }),
  };
}

export function createErrorAnalysis(message: string, sources: readonly string[] = []): VerificationAnalysis {
  return createAnalysis({
    status: 'ERROR',
    confidence: 0,
    reasoning: message,
    sources,
    error: message,
  });
}

/**
 * Same analysis with a different source list.
 */
export function withSources(analysis: VerificationAnalysis, sources: readonly string[]): VerificationAnalysis {
  return { ...analysis, sources: dedupe(sources) };
}

// ─────────────────────────────────────────────────────────────────────────────────
// JUDGMENT
// ─────────────────────────────────────────────────────────────────────────────────

export type Verdict = 'REAL' | 'FAKE' | 'MISLEADING' | 'UNCERTAIN' | 'ERROR';

export interface Judgment {
  readonly verdict: Verdict;
  readonly confidence: number;
  readonly reason: string;
}

export function createJudgment(verdict: Verdict, confidence: number, reason: string): Judgment {
  return { verdict, confidence: clampConfidence(confidence), reason };
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACT CHECK
// ─────────────────────────────────────────────────────────────────────────────────

export interface FactCheck {
  readonly question: string;
  readonly analysis: VerificationAnalysis;
}
