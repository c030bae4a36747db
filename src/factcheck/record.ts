// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS RESULT — Outbound JSON Record
// ═══════════════════════════════════════════════════════════════════════════════
//
// Field names are snake_case and stable: the HTTP API and CLI emit this
// record as-is. Every path through the pipeline produces a complete record.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { averageConfidence } from './judge.js';
import { assessSourceQuality, type SourceQuality } from './sources.js';
import { VERIFICATION_STATUSES } from './types.js';
import type { FactCheck, Judgment, Question, VerificationAnalysis } from './types.js';

export const NOT_ENOUGH_CONTEXT_JUDGMENT = 'Not enough context';
export const NOT_ENOUGH_CONTEXT_REASON = "The content doesn't contain factual claims that can be verified.";

/** Fixed confidence reported for the question-generation step */
export const QUESTION_GENERATOR_CONFIDENCE = 0.8;

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

const unit = z.number().min(0).max(1);

export const AnalysisRecordSchema = z.object({
  verification_status: z.enum(VERIFICATION_STATUSES),
  confidence_score: unit,
  supporting_evidence: z.array(z.string()),
  contradicting_evidence: z.array(z.string()),
  reasoning: z.string().min(1),
  evidence_gaps: z.array(z.string()),
  recommendations: z.array(z.string()),
  sources: z.array(z.string()),
  source_evaluations: z.array(
    z.object({
      source: z.string(),
      verdict: z.enum(['YES', 'NO']),
      reason: z.string(),
    })
  ),
  error: z.string().optional(),
});

export const ProcessResultSchema = z.object({
  initial_questions: z.array(z.string()),
  fact_checks: z.array(
    z.object({
      question: z.string(),
      analysis: AnalysisRecordSchema,
    })
  ),
  judgment: z.union([
    z.enum(['REAL', 'FAKE', 'MISLEADING', 'UNCERTAIN', 'ERROR']),
    z.literal(NOT_ENOUGH_CONTEXT_JUDGMENT),
  ]),
  judgment_confidence: unit,
  judgment_reason: z.string(),
  metadata: z.object({
    confidence_scores: z.object({
      question_generator: unit,
      fact_checking: unit,
      judge: unit,
    }),
    source_quality: z.object({
      score: unit,
      total_sources: z.number().int().min(0),
      trusted_sources: z.number().int().min(0),
      questionable_sources: z.number().int().min(0),
      distinct_domains: z.number().int().min(0),
      summary: z.string(),
    }),
    processing_time_ms: z.number().min(0),
  }),
});

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;
export type ProcessResult = z.infer<typeof ProcessResultSchema>;
export type SourceQualityRecord = ProcessResult['metadata']['source_quality'];

// ─────────────────────────────────────────────────────────────────────────────────
// CONVERSION
// ─────────────────────────────────────────────────────────────────────────────────

export function toAnalysisRecord(analysis: VerificationAnalysis): AnalysisRecord {
  return {
    verification_status: analysis.status,
    confidence_score: analysis.confidence,
    supporting_evidence: [...analysis.supportingEvidence],
    contradicting_evidence: [...analysis.contradictingEvidence],
    reasoning: analysis.reasoning,
    evidence_gaps: [...analysis.evidenceGaps],
    recommendations: [...analysis.recommendations],
    sources: [...analysis.sources],
    source_evaluations: analysis.sourceEvaluations.map((evaluation) => ({ ...evaluation })),
    ...(analysis.error !== undefined && { error: analysis.error }),
  };
}

export function toSourceQualityRecord(quality: SourceQuality): SourceQualityRecord {
  return {
    score: quality.score,
    total_sources: quality.totalSources,
    trusted_sources: quality.trustedSources,
    questionable_sources: quality.questionableSources,
    distinct_domains: quality.distinctDomains,
    summary: quality.summary,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// BUILDERS
// ─────────────────────────────────────────────────────────────────────────────────

export interface CompletedRun {
  readonly questions: readonly Question[];
  readonly factChecks: readonly FactCheck[];
  readonly judgment: Judgment;
  readonly processingTimeMs: number;
}

export function buildProcessResult(run: CompletedRun): ProcessResult {
  const analyses = run.factChecks.map((check) => check.analysis);

  return {
    initial_questions: run.questions.map((question) => question.text),
    fact_checks: run.factChecks.map((check) => ({
      question: check.question,
      analysis: toAnalysisRecord(check.analysis),
    })),
    judgment: run.judgment.verdict,
    judgment_confidence: run.judgment.confidence,
    judgment_reason: run.judgment.reason,
    metadata: {
      confidence_scores: {
        question_generator: QUESTION_GENERATOR_CONFIDENCE,
        fact_checking: averageConfidence(analyses),
        judge: run.judgment.confidence,
      },
      source_quality: toSourceQualityRecord(assessSourceQuality(analyses)),
      processing_time_ms: run.processingTimeMs,
    },
  };
}

export function notEnoughContextResult(processingTimeMs: number): ProcessResult {
  return {
    initial_questions: [],
    fact_checks: [],
    judgment: NOT_ENOUGH_CONTEXT_JUDGMENT,
    judgment_confidence: 0.5,
    judgment_reason: NOT_ENOUGH_CONTEXT_REASON,
    metadata: {
      confidence_scores: { question_generator: 0.5, fact_checking: 0, judge: 0.5 },
      source_quality: toSourceQualityRecord(assessSourceQuality([])),
      processing_time_ms: processingTimeMs,
    },
  };
}

export function errorResult(
  reason: string,
  processingTimeMs: number,
  partial: { readonly questions?: readonly Question[]; readonly factChecks?: readonly FactCheck[] } = {}
): ProcessResult {
  const factChecks = partial.factChecks ?? [];

  return {
    initial_questions: (partial.questions ?? []).map((question) => question.text),
    fact_checks: factChecks.map((check) => ({
      question: check.question,
      analysis: toAnalysisRecord(check.analysis),
    })),
    judgment: 'ERROR',
    judgment_confidence: 0,
    judgment_reason: reason,
    metadata: {
      confidence_scores: { question_generator: 0, fact_checking: 0, judge: 0 },
      source_quality: toSourceQualityRecord(assessSourceQuality(factChecks.map((check) => check.analysis))),
      processing_time_ms: processingTimeMs,
    },
  };
}
