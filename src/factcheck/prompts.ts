// ═══════════════════════════════════════════════════════════════════════════════
// PROMPTS — Question Generation and Claim Verification
// ═══════════════════════════════════════════════════════════════════════════════
//
// Both builders are deterministic. The verification prompt asks for the
// numbered headings the response parser reads.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { encyclopediaItems, webItems } from './types.js';
import type { EvidenceBundle } from './types.js';

export const NOT_ENOUGH_CONTEXT = 'not enough context';

export const NO_WEB_EVIDENCE = 'No web results found or error during search.';
export const NO_ENCYCLOPEDIA_EVIDENCE = 'No encyclopedia results found or error during search.';

// ─────────────────────────────────────────────────────────────────────────────────
// QUESTION GENERATION
// ─────────────────────────────────────────────────────────────────────────────────

export function buildQuestionPrompt(content: string, maxQuestions: number): string {
  return `Critically evaluate the following content:

"""
${content}
"""

Decide whether it contains factual claims that can be checked against public sources such as news reports or established reference works.

If the content is subjective, personal, unverifiable, nonsensical or too vague for a factual lookup, return ONLY the exact text: ${NOT_ENOUGH_CONTEXT}

Otherwise, write up to ${maxQuestions} specific, concise yes/no questions that target the main factual claims, each answerable with a web search. Return ONLY the questions, one per line, without numbering or bullet points.`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// VERIFICATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface VerificationPromptOptions {
  /** Excerpt length limit per evidence item */
  readonly excerptChars?: number;
  readonly requestSourceEvaluation?: boolean;
}

export function truncateExcerpt(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

export function renderWebEvidence(bundle: EvidenceBundle, excerptChars: number): string {
  const items = webItems(bundle);
  if (items.length === 0) {
    return NO_WEB_EVIDENCE;
  }
  return items
    .map((item) => `- ${truncateExcerpt(item.excerpt, excerptChars)} (Source: ${item.locator})`)
    .join('\n');
}

export function renderEncyclopediaEvidence(bundle: EvidenceBundle, excerptChars: number): string {
  const items = encyclopediaItems(bundle);
  if (items.length === 0) {
    return NO_ENCYCLOPEDIA_EVIDENCE;
  }
  return items
    .map((item) => `- ${item.locator}: ${truncateExcerpt(item.excerpt, excerptChars)}`)
    .join('\n');
}

const SECTION_INSTRUCTIONS = [
  'Verification Status: one of VERIFIED, FALSE, PARTIALLY_TRUE, MISLEADING, UNSUBSTANTIATED, UNABLE_TO_VERIFY',
  'Confidence Score: a number from 0.0 to 1.0 for your certainty, based only on the evidence above',
  'Supporting Evidence: bullet points from the evidence that support the claim',
  'Contradicting Evidence: bullet points from the evidence that contradict the claim',
  'Reasoning: a step-by-step explanation that refers to the evidence',
  'Evidence Gaps: bullet points naming information that would make the assessment more certain',
  'Recommendations: bullet points suggesting further checks',
];

const SOURCE_EVALUATION_INSTRUCTION =
  'Source Evaluation: one line per source in the form "- {source}: YES|NO - {reason}", ' +
  'YES when the source supports the claim and NO when it does not';

export function buildVerificationPrompt(
  content: string,
  question: string,
  bundle: EvidenceBundle,
  options: VerificationPromptOptions = {}
): string {
  const excerptChars = options.excerptChars ?? 500;

  const sections = (options.requestSourceEvaluation ?? true)
    ? [...SECTION_INSTRUCTIONS, SOURCE_EVALUATION_INSTRUCTION]
    : SECTION_INSTRUCTIONS;

  const headings = sections.map((section, i) => `${i + 1}. ${section}`).join('\n');

  return `Perform a fact-checking assessment based ONLY on the content and evidence below.

Original Content:
${content}

Question to Verify:
${question}

Web Search Evidence:
${renderWebEvidence(bundle, excerptChars)}

Encyclopedia Evidence:
${renderEncyclopediaEvidence(bundle, excerptChars)}

Instructions:
Answer the question to verify in relation to the original content. Respond ONLY with these numbered headings, in this order:
${headings}`;
}
