// ═══════════════════════════════════════════════════════════════════════════════
// FACT-CHECK PIPELINE — Questions → Evidence → Verification → Judgment
// ═══════════════════════════════════════════════════════════════════════════════
//
// process() never rejects. Failures become, in order of scope:
//   - one question:        an ERROR analysis for that question
//   - question generation: a "Not enough context" or ERROR record
//   - anything else:       an ERROR record
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { ConfidencePrecedence } from '../config/schema.js';
import { getLogger } from '../observability/logging/index.js';
import type { EvidenceGatherer } from './evidence.js';
import { judge, DEFAULT_THRESHOLDS, type JudgeThresholds } from './judge.js';
import { parseVerificationResponse } from './parser/index.js';
import type { QuestionGenerator } from './questions.js';
import { buildProcessResult, errorResult, notEnoughContextResult, type ProcessResult } from './record.js';
import { assembleSources } from './sources.js';
import { createErrorAnalysis, withSources } from './types.js';
import type { FactCheck, Question } from './types.js';
import { VERIFIER_FAILURE_MESSAGE, type ClaimVerifier } from './verifier.js';

const logger = getLogger({ component: 'pipeline' });

export const QUESTION_FAILURE_REASON = 'Failed to generate questions.';

// ─────────────────────────────────────────────────────────────────────────────────
// WORKER POOL
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Map with at most `limit` calls in flight. Results keep input order.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item !== undefined) {
        results[index] = await fn(item, index);
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);
  return results;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PIPELINE
// ─────────────────────────────────────────────────────────────────────────────────

export interface FactCheckPipelineDependencies {
  readonly questions: QuestionGenerator;
  readonly gatherer: EvidenceGatherer;
  readonly verifier: ClaimVerifier;
}

export interface FactCheckPipelineOptions {
  /** Questions checked at once; 1 runs them in sequence */
  readonly concurrency?: number;
  readonly thresholds?: JudgeThresholds;
  readonly confidencePrecedence?: ConfidencePrecedence;
  readonly now?: () => number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FactCheckPipeline {
  private readonly questions: QuestionGenerator;
  private readonly gatherer: EvidenceGatherer;
  private readonly verifier: ClaimVerifier;
  private readonly concurrency: number;
  private readonly thresholds: JudgeThresholds;
  private readonly confidencePrecedence: ConfidencePrecedence;
  private readonly now: () => number;

  constructor(deps: FactCheckPipelineDependencies, options: FactCheckPipelineOptions = {}) {
    this.questions = deps.questions;
    this.gatherer = deps.gatherer;
    this.verifier = deps.verifier;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.confidencePrecedence = options.confidencePrecedence ?? 'explicit-first';
    this.now = options.now ?? Date.now;
  }

  async process(content: string): Promise<ProcessResult> {
    const startedAt = this.now();

    try {
      return await this.run(content, startedAt);
    } catch (error) {
      logger.error('Fact-checking pipeline failed', error);
      return errorResult(`Fact-checking pipeline failed: ${errorMessage(error)}`, this.now() - startedAt);
    }
  }

  /**
   * Gather, verify and parse one question. Never throws.
   */
  async checkQuestion(content: string, question: Question): Promise<FactCheck> {
    try {
      const bundle = await this.gatherer.gather(question.text);
      const sources = assembleSources(bundle);

      const raw = await this.verifier.verify(content, question, bundle);
      if (raw === null) {
        return { question: question.text, analysis: createErrorAnalysis(VERIFIER_FAILURE_MESSAGE, sources) };
      }

      const analysis = parseVerificationResponse(raw, question.text, {
        confidencePrecedence: this.confidencePrecedence,
      });
      return { question: question.text, analysis: withSources(analysis, sources) };
    } catch (error) {
      logger.warn('Question check failed', { question: question.text.slice(0, 80), error: errorMessage(error) });
      return {
        question: question.text,
        analysis: createErrorAnalysis(`Error during analysis: ${errorMessage(error)}`),
      };
    }
  }

  private async run(content: string, startedAt: number): Promise<ProcessResult> {
    const generated = await this.questions.generate(content);

    if (!generated.ok) {
      if (generated.error.kind === 'not_enough_context') {
        logger.info('Content has no checkable claims');
        return notEnoughContextResult(this.now() - startedAt);
      }
      return errorResult(QUESTION_FAILURE_REASON, this.now() - startedAt);
    }

    const questions = generated.value;
    const factChecks = await mapConcurrent(questions, this.concurrency, (question) =>
      this.checkQuestion(content, question)
    );

    const judgment = judge(
      factChecks.map((check) => check.analysis),
      this.thresholds
    );

    logger.info('Judgment reached', {
      verdict: judgment.verdict,
      confidence: judgment.confidence,
      questions: questions.length,
    });

    return buildProcessResult({
      questions,
      factChecks,
      judgment,
      processingTimeMs: this.now() - startedAt,
    });
  }
}
