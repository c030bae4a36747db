// ═══════════════════════════════════════════════════════════════════════════════
// CONFIDENCE RESOLUTION — Explicit Score, Implied Score, Source Votes, Defaults
// ═══════════════════════════════════════════════════════════════════════════════
//
// explicit-first:  explicit → implied → votes → default
// votes-first:     votes → explicit → implied → default
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { ConfidencePrecedence } from '../../config/schema.js';
import type { SourceEvaluation, VerificationStatus } from '../types.js';
import { clampConfidence } from '../types.js';
import { toUnitInterval } from './status.js';

export type ConfidenceBasis = 'explicit' | 'implied' | 'votes' | 'default';

export const DEFAULT_CONFIDENCE: Readonly<Record<VerificationStatus, number>> = {
  VERIFIED: 0.85,
  FALSE: 0.85,
  PARTIALLY_TRUE: 0.65,
  MISLEADING: 0.65,
  UNSUBSTANTIATED: 0.55,
  UNABLE_TO_VERIFY: 0.5,
  ERROR: 0,
};

// ─────────────────────────────────────────────────────────────────────────────────
// EXPLICIT
// ─────────────────────────────────────────────────────────────────────────────────

const NUMBER = '(\\d+(?:\\.\\d+)?|\\.\\d+)[ \\t]*(?:(%)|\\/[ \\t]*(\\d+(?:\\.\\d+)?))?';

/** 0.85, 85%, 8/10 */
const FIRST_NUMBER = new RegExp(NUMBER);

/** A line holding nothing but a number */
const LONE_NUMBER = new RegExp('^[ \\t*_]*' + NUMBER + '[ \\t*_]*$', 'm');

const LABELLED_NUMBER = new RegExp(
  'confidence(?:[ \\t]+(?:score|level))?[ \\t]*(?:is|of|[:=\\-–])?[ \\t]*\\**[ \\t]*' + NUMBER,
  'i'
);

function readNumber(match: RegExpExecArray | null): number | undefined {
  const digits = match?.[1];
  if (!match || digits === undefined) {
    return undefined;
  }

  const value = Number.parseFloat(digits);
  const denominator = match[3] === undefined ? undefined : Number.parseFloat(match[3]);
  if (denominator !== undefined && denominator > 0) {
    return clampConfidence(value / denominator);
  }
  return toUnitInterval(digits, match[2] === '%');
}

/**
 * First number in the confidence section, else a number labelled
 * "confidence" anywhere in the full text, else a number standing alone on
 * a line of the full text.
 */
export function extractExplicitConfidence(sectionText: string, fullText: string): number | undefined {
  if (sectionText.trim()) {
    const fromSection = readNumber(FIRST_NUMBER.exec(sectionText));
    if (fromSection !== undefined) {
      return fromSection;
    }
  }
  return readNumber(LABELLED_NUMBER.exec(fullText)) ?? readNumber(LONE_NUMBER.exec(fullText));
}

// ─────────────────────────────────────────────────────────────────────────────────
// SOURCE VOTES
// ─────────────────────────────────────────────────────────────────────────────────

function agreeingVerdict(status: VerificationStatus): 'YES' | 'NO' | undefined {
  switch (status) {
    case 'VERIFIED':
    case 'PARTIALLY_TRUE':
      return 'YES';
    case 'FALSE':
    case 'MISLEADING':
      return 'NO';
    default:
      return undefined;
  }
}

/**
 * Share of evaluated sources whose verdict agrees with the status polarity.
 * Undefined with no evaluations or a status without polarity.
 */
export function voteConfidence(
  status: VerificationStatus,
  evaluations: readonly SourceEvaluation[]
): number | undefined {
  const agreeing = agreeingVerdict(status);
  if (agreeing === undefined || evaluations.length === 0) {
    return undefined;
  }
  const votes = evaluations.filter((evaluation) => evaluation.verdict === agreeing).length;
  return votes / evaluations.length;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESOLUTION
// ─────────────────────────────────────────────────────────────────────────────────

export interface ConfidenceSignals {
  readonly status: VerificationStatus;
  readonly explicit?: number;
  readonly implied?: number;
  readonly votes?: number;
}

export interface ResolvedConfidence {
  readonly value: number;
  readonly basis: ConfidenceBasis;
}

const ORDER: Readonly<Record<ConfidencePrecedence, readonly Exclude<ConfidenceBasis, 'default'>[]>> = {
  'explicit-first': ['explicit', 'implied', 'votes'],
  'votes-first': ['votes', 'explicit', 'implied'],
};

export function resolveConfidence(
  signals: ConfidenceSignals,
  precedence: ConfidencePrecedence = 'explicit-first'
): ResolvedConfidence {
  for (const basis of ORDER[precedence]) {
    const value = signals[basis];
    if (value !== undefined) {
      return { value, basis };
    }
  }
  return { value: DEFAULT_CONFIDENCE[signals.status], basis: 'default' };
}
