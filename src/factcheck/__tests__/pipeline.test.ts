// ═══════════════════════════════════════════════════════════════════════════════
// FACT-CHECK PIPELINE TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import { RateLimitExceededError } from '../../infrastructure/rate-limit/errors.js';
import { EvidenceGatherer } from '../evidence.js';
import { PLACEHOLDER_SOURCE } from '../sources.js';
import { FactCheckPipeline, mapConcurrent, QUESTION_FAILURE_REASON } from '../pipeline.js';
import { QuestionGenerator } from '../questions.js';
import { NOT_ENOUGH_CONTEXT_JUDGMENT, NOT_ENOUGH_CONTEXT_REASON, ProcessResultSchema } from '../record.js';
import { ClaimVerifier, VERIFIER_FAILURE_MESSAGE } from '../verifier.js';
import { FailingSearchProvider, FakeLanguageModel, FakeSearchProvider, isQuestionPrompt, type Responder, type SearchBehaviour } from './fakes.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

const EIFFEL_CONTENT = 'The Eiffel Tower is located in Berlin.';
const EIFFEL_QUESTION = 'Is the Eiffel Tower located in Berlin?';
const EIFFEL_URL = 'https://www.toureiffel.paris/en';

const FALSE_REPLY = `1. Verification Status: FALSE
2. Confidence Score: 0.95
3. Supporting Evidence:
- None
4. Contradicting Evidence:
- The official site places the tower in Paris.
5. Reasoning: The evidence places the tower in Paris, not Berlin.
6. Evidence Gaps:
- None identified.
7. Recommendations:
- Consult an official tourism site.`;

function verifiedReply(confidence: number): string {
  return `Verification Status: VERIFIED\nConfidence Score: ${confidence}\nReasoning: Sources agree.`;
}

interface Harness {
  readonly pipeline: FactCheckPipeline;
  readonly model: FakeLanguageModel;
  readonly gatherer: EvidenceGatherer;
  readonly questions: QuestionGenerator;
}

function createHarness(
  respond: Responder,
  web: SearchBehaviour = [{ title: 'Official site', url: EIFFEL_URL, snippet: 'The tower stands in Paris.' }],
  concurrency = 1
): Harness {
  const model = new FakeLanguageModel(respond);
  const gatherer = new EvidenceGatherer(
    new FakeSearchProvider('web', web),
    new FakeSearchProvider('encyclopedia', [
      { title: 'Eiffel Tower', url: 'https://en.wikipedia.org/wiki/Eiffel_Tower', snippet: 'Tower in Paris.' },
    ])
  );

  const questions = new QuestionGenerator(model, { maxQuestions: 4 });

  let clock = 1000;
  const pipeline = new FactCheckPipeline(
    {
      questions,
      gatherer,
      verifier: new ClaimVerifier(model),
    },
    { concurrency, now: () => (clock += 10) }
  );

  return { pipeline, model, gatherer, questions };
}

function eiffelResponder(prompt: string): string {
  return isQuestionPrompt(prompt) ? EIFFEL_QUESTION : FALSE_REPLY;
}

// ─────────────────────────────────────────────────────────────────────────────────
// END TO END
// ─────────────────────────────────────────────────────────────────────────────────

describe('FactCheckPipeline.process', () => {
  it('should judge a false claim as FAKE', async () => {
    const { pipeline, model } = createHarness(eiffelResponder);

    const result = await pipeline.process(EIFFEL_CONTENT);

    expect(ProcessResultSchema.safeParse(result).success).toBe(true);
    expect(model.prompts).toHaveLength(2);
    expect(result.initial_questions).toEqual([EIFFEL_QUESTION]);
    expect(result.judgment).toBe('FAKE');
    expect(result.judgment_confidence).toBe(0.95);
    expect(result.judgment_reason).toBe(
      'Based on 0 verified, 1 false or misleading, and 0 uncertain fact checks (average confidence 0.95).\n\n' +
        'Summary of key findings:\n' +
        '- Check #1: False - The evidence places the tower in Paris, not Berlin.'
    );

    const check = result.fact_checks[0];
    expect(check?.question).toBe(EIFFEL_QUESTION);
    expect(check?.analysis.verification_status).toBe('FALSE');
    expect(check?.analysis.confidence_score).toBe(0.95);
    expect(check?.analysis.supporting_evidence).toEqual([]);
    expect(check?.analysis.contradicting_evidence).toEqual(['The official site places the tower in Paris.']);
    expect(check?.analysis.recommendations).toEqual(['Consult an official tourism site.']);
    expect(check?.analysis.sources).toEqual([EIFFEL_URL, 'Wikipedia']);

    expect(result.metadata.confidence_scores).toEqual({ question_generator: 0.8, fact_checking: 0.95, judge: 0.95 });
    expect(result.metadata.source_quality.score).toBe(0.5);
    expect(result.metadata.source_quality.total_sources).toBe(2);
    expect(result.metadata.source_quality.distinct_domains).toBe(2);
    expect(result.metadata.processing_time_ms).toBe(10);
  });

  it('should short-circuit content without checkable claims', async () => {
    const { pipeline, model } = createHarness(() => 'Not enough context');

    const result = await pipeline.process('I feel great today.');

    expect(ProcessResultSchema.safeParse(result).success).toBe(true);
    expect(model.prompts).toHaveLength(1);
    expect(result.judgment).toBe(NOT_ENOUGH_CONTEXT_JUDGMENT);
    expect(result.judgment_confidence).toBe(0.5);
    expect(result.judgment_reason).toBe(NOT_ENOUGH_CONTEXT_REASON);
    expect(result.fact_checks).toEqual([]);
    expect(result.metadata.confidence_scores).toEqual({ question_generator: 0.5, fact_checking: 0, judge: 0.5 });
  });

  it('should report a question generation failure as ERROR', async () => {
    const { pipeline } = createHarness(() => {
      throw new Error('quota exhausted');
    });

    const result = await pipeline.process(EIFFEL_CONTENT);

    expect(result.judgment).toBe('ERROR');
    expect(result.judgment_confidence).toBe(0);
    expect(result.judgment_reason).toBe(QUESTION_FAILURE_REASON);
    expect(result.initial_questions).toEqual([]);
  });

  it('should report an unexpected failure without rejecting', async () => {
    const { pipeline, questions } = createHarness(eiffelResponder);
    vi.spyOn(questions, 'generate').mockRejectedValueOnce(new Error('boom'));

    const result = await pipeline.process(EIFFEL_CONTENT);

    expect(result.judgment).toBe('ERROR');
    expect(result.judgment_reason).toBe('Fact-checking pipeline failed: boom');
    expect(ProcessResultSchema.safeParse(result).success).toBe(true);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// PER-QUESTION ISOLATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('per-question failures', () => {
  it('should turn a failed verification into an ERROR analysis that keeps its sources', async () => {
    const { pipeline } = createHarness((prompt) => {
      if (isQuestionPrompt(prompt)) return 'Is A true?\nIs B true?';
      if (prompt.includes('Is B true?')) throw new Error('upstream timeout');
      return verifiedReply(0.9);
    });

    const result = await pipeline.process('A and B.');

    expect(result.fact_checks.map((check) => check.analysis.verification_status)).toEqual(['VERIFIED', 'ERROR']);
    const failed = result.fact_checks[1]?.analysis;
    expect(failed?.reasoning).toBe(VERIFIER_FAILURE_MESSAGE);
    expect(failed?.error).toBe(VERIFIER_FAILURE_MESSAGE);
    expect(failed?.confidence_score).toBe(0);
    expect(failed?.sources).toEqual([EIFFEL_URL, 'Wikipedia']);
    // verified share 0.5 < 0.6
    expect(result.judgment).toBe('UNCERTAIN');
  });

  it('should isolate a rate-limited question', async () => {
    const { pipeline, gatherer } = createHarness((prompt) =>
      isQuestionPrompt(prompt) ? 'Is A true?\nIs B true?' : verifiedReply(0.9)
    );
    vi.spyOn(gatherer, 'gather').mockRejectedValueOnce(new RateLimitExceededError('llm', 3, new Error('429')));

    const result = await pipeline.process('A and B.');

    const first = result.fact_checks[0]?.analysis;
    expect(first?.verification_status).toBe('ERROR');
    expect(first?.reasoning).toBe('Error during analysis: Rate limit exceeded for llm after 3 attempts: 429');
    expect(first?.sources).toEqual([]);
    expect(result.fact_checks[1]?.analysis.verification_status).toBe('VERIFIED');
  });
});

describe('empty evidence', () => {
  it('should still produce an analysis when both lookups fail', async () => {
    const model = new FakeLanguageModel((prompt) =>
      isQuestionPrompt(prompt) ? EIFFEL_QUESTION : 'There is not enough evidence to decide.'
    );
    const pipeline = new FactCheckPipeline({
      questions: new QuestionGenerator(model),
      gatherer: new EvidenceGatherer(new FailingSearchProvider('web'), new FailingSearchProvider('encyclopedia')),
      verifier: new ClaimVerifier(model),
    });

    const result = await pipeline.process(EIFFEL_CONTENT);

    const analysis = result.fact_checks[0]?.analysis;
    expect(analysis?.verification_status).toBe('UNABLE_TO_VERIFY');
    expect(analysis?.confidence_score).toBe(0.5);
    expect(analysis?.sources).toEqual([PLACEHOLDER_SOURCE]);
    expect(model.prompts[1]).toContain('No web results found or error during search.');
    expect(result.judgment).toBe('UNCERTAIN');
    expect(result.metadata.source_quality.total_sources).toBe(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CONCURRENCY
// ─────────────────────────────────────────────────────────────────────────────────

describe('concurrency', () => {
  it('should bound in-flight questions and keep question order', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const delays: Record<string, number> = { 'Q1?': 40, 'Q2?': 5, 'Q3?': 20, 'Q4?': 1 };

    const web = async (query: string) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delays[query] ?? 1));
      inFlight--;
      return [{ title: query, url: `https://example.com/${query.slice(0, 2)}`, snippet: 'text' }];
    };

    const { pipeline } = createHarness(
      (prompt) => (isQuestionPrompt(prompt) ? 'Q1?\nQ2?\nQ3?\nQ4?' : verifiedReply(0.9)),
      web,
      2
    );

    const result = await pipeline.process('Four claims.');

    expect(maxInFlight).toBe(2);
    expect(result.fact_checks.map((check) => check.question)).toEqual(['Q1?', 'Q2?', 'Q3?', 'Q4?']);
    expect(result.judgment).toBe('REAL');
  });
});

describe('mapConcurrent', () => {
  it('should preserve input order', async () => {
    const result = await mapConcurrent([30, 10, 20], 3, async (ms, index) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return index;
    });

    expect(result).toEqual([0, 1, 2]);
  });

  it('should handle an empty list', async () => {
    const fn = vi.fn(async (n: number) => n);

    expect(await mapConcurrent([], 4, fn)).toEqual([]);
    expect(fn).not.toHaveBeenCalled();
  });

  it('should run one at a time with a limit of 1', async () => {
    const order: string[] = [];

    await mapConcurrent(['a', 'b'], 1, async (item) => {
      order.push(`start ${item}`);
      await Promise.resolve();
      order.push(`end ${item}`);
    });

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b']);
  });
});
