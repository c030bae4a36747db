// ═══════════════════════════════════════════════════════════════════════════════
// QUESTION GENERATOR — Verification Questions or "Not Enough Context"
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import type { LanguageModel } from '../services/llm/types.js';
import { err, ok, type Result } from '../types/result.js';
import { buildQuestionPrompt, NOT_ENOUGH_CONTEXT } from './prompts.js';
import { createQuestion, type Question } from './types.js';
import { stripListMarker } from './parser/lists.js';

const logger = getLogger({ component: 'questions' });

export type QuestionGenerationError =
  | { readonly kind: 'not_enough_context' }
  | { readonly kind: 'no_questions' }
  | { readonly kind: 'oracle_failure'; readonly message: string };

export interface QuestionGeneratorOptions {
  readonly maxQuestions?: number;
}

/**
 * Questions from the model's reply: one per line, markers stripped, lines
 * without a letter dropped.
 */
export function parseQuestions(text: string, maxQuestions: number): Result<Question[], QuestionGenerationError> {
  if (text.toLowerCase().includes(NOT_ENOUGH_CONTEXT)) {
    return err({ kind: 'not_enough_context' });
  }

  const questions = text
    .split(/\r?\n/)
    .map((line) => stripListMarker(line).replace(/^["']|["']$/g, '').trim())
    .filter((line) => /\p{L}/u.test(line))
    .slice(0, maxQuestions)
    .map((line) => createQuestion(line));

  return questions.length > 0 ? ok(questions) : err({ kind: 'no_questions' });
}

export class QuestionGenerator {
  private readonly maxQuestions: number;

  constructor(
    private readonly model: LanguageModel,
    options: QuestionGeneratorOptions = {}
  ) {
    this.maxQuestions = options.maxQuestions ?? 3;
  }

  async generate(content: string): Promise<Result<Question[], QuestionGenerationError>> {
    if (!content.trim()) {
      return err({ kind: 'not_enough_context' });
    }

    let text: string;
    try {
      text = await this.model.complete(buildQuestionPrompt(content, this.maxQuestions));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Question generation failed', error, { model: this.model.name });
      return err({ kind: 'oracle_failure', message });
    }

    const result = parseQuestions(text, this.maxQuestions);
    if (result.ok) {
      logger.info('Questions generated', { count: result.value.length });
    } else {
      logger.info('No questions generated', { reason: result.error.kind });
    }
    return result;
  }
}
