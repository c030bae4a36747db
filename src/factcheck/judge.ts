// ═══════════════════════════════════════════════════════════════════════════════
// JUDGMENT AGGREGATOR — Per-Question Analyses to One Verdict
// ═══════════════════════════════════════════════════════════════════════════════
//
// Decision order, first match wins:
//   1. any false-like check with confidence ≥ fakeConfidence → FAKE
//   2. any false-like check                                  → MISLEADING
//   3. verified share ≥ realRatio and avg ≥ realConfidence  → REAL
//   4. otherwise                                             → UNCERTAIN
//
// False-like signals dominate. Every reached verdict has confidence ≥ 0.5.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { JudgeConfig } from '../config/schema.js';
import { clampConfidence, createJudgment, statusLabel } from './types.js';
import type { Judgment, VerificationAnalysis, VerificationStatus } from './types.js';

export type JudgeThresholds = JudgeConfig;

export const DEFAULT_THRESHOLDS: JudgeThresholds = {
  fakeConfidence: 0.7,
  realRatio: 0.6,
  realConfidence: 0.7,
};

export const NO_ANALYSES_REASON = 'No analyses were provided.';

const EXCERPT_CHARS = 100;

// ─────────────────────────────────────────────────────────────────────────────────
// BUCKETS
// ─────────────────────────────────────────────────────────────────────────────────

export type StatusBucket = 'verified' | 'false' | 'uncertain';

export function bucketOf(status: VerificationStatus): StatusBucket {
  switch (status) {
    case 'VERIFIED':
      return 'verified';
    case 'FALSE':
    case 'MISLEADING':
    case 'PARTIALLY_TRUE':
      return 'false';
    case 'UNSUBSTANTIATED':
    case 'UNABLE_TO_VERIFY':
    case 'ERROR':
      return 'uncertain';
  }
}

export interface BucketCounts {
  readonly verified: number;
  readonly false: number;
  readonly uncertain: number;
}

export function countBuckets(analyses: readonly VerificationAnalysis[]): BucketCounts {
  const counts = { verified: 0, false: 0, uncertain: 0 };
  for (const analysis of analyses) {
    counts[bucketOf(analysis.status)]++;
  }
  return counts;
}

export function averageConfidence(analyses: readonly VerificationAnalysis[]): number {
  if (analyses.length === 0) {
    return 0;
  }
  const total = analyses.reduce(
    (sum, analysis) => sum + (analysis.status === 'ERROR' ? 0 : analysis.confidence),
    0
  );
  return total / analyses.length;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REASON
// ─────────────────────────────────────────────────────────────────────────────────

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function excerpt(reasoning: string): string {
  return reasoning.length > EXCERPT_CHARS ? `${reasoning.slice(0, EXCERPT_CHARS)}...` : reasoning;
}

export function buildReason(analyses: readonly VerificationAnalysis[], counts: BucketCounts, avg: number): string {
  const header =
    `Based on ${counts.verified} verified, ${counts.false} false or misleading, ` +
    `and ${counts.uncertain} uncertain fact checks (average confidence ${avg.toFixed(2)}).`;

  const findings = analyses.map(
    (analysis, i) => `- Check #${i + 1}: ${capitalize(statusLabel(analysis.status))} - ${excerpt(analysis.reasoning)}`
  );

  return `${header}\n\nSummary of key findings:\n${findings.join('\n')}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// JUDGE
// ─────────────────────────────────────────────────────────────────────────────────

export function judge(
  analyses: readonly VerificationAnalysis[],
  thresholds: JudgeThresholds = DEFAULT_THRESHOLDS
): Judgment {
  if (analyses.length === 0) {
    return createJudgment('UNCERTAIN', 0, NO_ANALYSES_REASON);
  }

  const counts = countBuckets(analyses);
  const avg = averageConfidence(analyses);
  const reason = buildReason(analyses, counts, avg);

  const falseLike = analyses.filter((analysis) => bucketOf(analysis.status) === 'false');
  const strongFalse = falseLike.filter((analysis) => analysis.confidence >= thresholds.fakeConfidence);

  if (strongFalse.length > 0) {
    const highest = Math.max(...strongFalse.map((analysis) => analysis.confidence));
    return createJudgment('FAKE', Math.max(0.5, highest), reason);
  }

  if (falseLike.length > 0) {
    return createJudgment('MISLEADING', clampConfidence(avg, 0.5, 0.8), reason);
  }

  if (counts.verified / analyses.length >= thresholds.realRatio && avg >= thresholds.realConfidence) {
    const highestVerified = Math.max(
      ...analyses.filter((analysis) => analysis.status === 'VERIFIED').map((analysis) => analysis.confidence)
    );
    return createJudgment('REAL', clampConfidence(Math.max(avg, highestVerified), 0.5, 1), reason);
  }

  return createJudgment('UNCERTAIN', clampConfidence(avg, 0.5, 0.7), reason);
}
