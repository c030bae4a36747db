// ═══════════════════════════════════════════════════════════════════════════════
// CLAIM VERIFIER — One Oracle Call per Question
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import type { LanguageModel } from '../services/llm/types.js';
import { buildVerificationPrompt, type VerificationPromptOptions } from './prompts.js';
import type { EvidenceBundle, Question } from './types.js';

const logger = getLogger({ component: 'verifier' });

export const VERIFIER_FAILURE_MESSAGE = 'Failed to get analysis from language model';

export type ClaimVerifierOptions = VerificationPromptOptions;

export class ClaimVerifier {
  constructor(
    private readonly model: LanguageModel,
    private readonly options: ClaimVerifierOptions = {}
  ) {}

  /**
   * Raw model text for the question, or null when the oracle failed.
   */
  async verify(content: string, question: Question, bundle: EvidenceBundle): Promise<string | null> {
    const prompt = buildVerificationPrompt(content, question.text, bundle, this.options);

    try {
      const text = await this.model.complete(prompt);
      return text.trim() ? text : null;
    } catch (error) {
      logger.error('Verification call failed', error, {
        model: this.model.name,
        question: question.text.slice(0, 80),
      });
      return null;
    }
  }
}
