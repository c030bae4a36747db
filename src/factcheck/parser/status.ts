// ═══════════════════════════════════════════════════════════════════════════════
// STATUS NORMALIZATION — Synonym Table and Numeric Status Lines
// ═══════════════════════════════════════════════════════════════════════════════

import type { VerificationStatus } from '../types.js';
import { clampConfidence, VERIFICATION_STATUSES } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SYNONYM TABLE
// ─────────────────────────────────────────────────────────────────────────────────

export interface StatusSynonym {
  readonly phrase: string;
  readonly status: VerificationStatus;
}

function group(status: VerificationStatus, phrases: readonly string[]): StatusSynonym[] {
  return phrases.map((phrase) => ({ phrase, status }));
}

/**
 * Substring, case-insensitive. The phrase found earliest in the line wins;
 * on a tie the longer phrase wins, so "partially true" beats "partially"
 * and "unable to verify" beats "unable".
 */
export const STATUS_SYNONYMS: readonly StatusSynonym[] = [
  ...group('PARTIALLY_TRUE', ['partially true', 'partly true', 'half true', 'partially', 'partly', 'mixed']),
  ...group('MISLEADING', ['misleading', 'out of context', 'exaggerated', 'distorted']),
  ...group('UNABLE_TO_VERIFY', [
    'unable to verify',
    'cannot verify',
    'cannot be verified',
    "can't be verified",
    'could not verify',
    'could not be verified',
    'unverifiable',
    'insufficient',
    'inconclusive',
    'undetermined',
    'unclear',
    'unable',
  ]),
  ...group('UNSUBSTANTIATED', [
    'unsubstantiated',
    'unsupported',
    'unproven',
    'unverified',
    'not verified',
    'unconfirmed',
    'not confirmed',
    'no evidence',
  ]),
  ...group('FALSE', ['not true', 'untrue', 'incorrect', 'inaccurate', 'false', 'fake', 'debunked', 'refuted', 'wrong']),
  ...group('VERIFIED', ['verified', 'confirmed', 'confirm', 'accurate', 'correct', 'true']),
];

// ─────────────────────────────────────────────────────────────────────────────────
// NUMERIC STATUS
// ─────────────────────────────────────────────────────────────────────────────────

const BARE_NUMBER = /^\s*(\d+(?:\.\d+)?|\.\d+)\s*(%)?\s*$/;

/**
 * Read a confidence-like number. `85%` and whole numbers from 2 to 100 are
 * percentages; anything else above 1 (e.g. `1.5`) is clamped, not rescaled.
 */
export function toUnitInterval(digits: string, percent: boolean): number {
  const value = Number.parseFloat(digits);
  const wholePercent = /^\d+$/.test(digits) && value >= 2 && value <= 100;
  return clampConfidence(percent || wholePercent ? value / 100 : value);
}

/**
 * Value of a status line that holds only a number, e.g. `0.85` or `85%`.
 */
export function parseBareNumber(text: string): number | undefined {
  const match = BARE_NUMBER.exec(text.replace(/[*_`]/g, ''));
  const digits = match?.[1];
  if (!match || digits === undefined) {
    return undefined;
  }
  return toUnitInterval(digits, match[2] === '%');
}

export function statusFromConfidence(confidence: number): VerificationStatus {
  if (confidence >= 0.8) return 'VERIFIED';
  if (confidence >= 0.6) return 'PARTIALLY_TRUE';
  if (confidence >= 0.4) return 'UNABLE_TO_VERIFY';
  if (confidence >= 0.2) return 'MISLEADING';
  return 'FALSE';
}

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface NormalizedStatus {
  readonly status: VerificationStatus;
  /** Set when the status line was a number rather than words */
  readonly impliedConfidence?: number;
  readonly matched: boolean;
}

// A status keyword opening the line, before any qualifier the model adds
const LEADING_TOKEN =
  /^[\s*_`"'([]*(verified|false|partially[\s_]+true|misleading|unsubstantiated|unable[\s_]+to[\s_]+verify)(?![a-z])/i;

function leadingStatus(text: string): VerificationStatus | undefined {
  const token = LEADING_TOKEN.exec(text)?.[1];
  if (token === undefined) {
    return undefined;
  }
  const key = token.toUpperCase().replace(/[\s_]+/g, '_');
  return VERIFICATION_STATUSES.find((status) => status === key);
}

function earliestSynonym(text: string): StatusSynonym | undefined {
  const lower = text.toLowerCase().replace(/_/g, ' ');
  let best: { synonym: StatusSynonym; index: number } | undefined;

  for (const synonym of STATUS_SYNONYMS) {
    const index = lower.indexOf(synonym.phrase);
    if (index < 0) continue;
    if (!best || index < best.index || (index === best.index && synonym.phrase.length > best.synonym.phrase.length)) {
      best = { synonym, index };
    }
  }
  return best?.synonym;
}

/**
 * Map a status line to a status: a bare number, then a status keyword at the
 * start of the line, then the earliest synonym anywhere in it.
 */
export function normalizeStatus(text: string): NormalizedStatus {
  const implied = parseBareNumber(text);
  if (implied !== undefined) {
    return { status: statusFromConfidence(implied), impliedConfidence: implied, matched: true };
  }

  const leading = leadingStatus(text);
  if (leading) {
    return { status: leading, matched: true };
  }

  const synonym = earliestSynonym(text);
  return synonym
    ? { status: synonym.status, matched: true }
    : { status: 'UNABLE_TO_VERIFY', matched: false };
}

const INLINE_STATUS = /verification\s+status\s*(?:is|[:\-–])\s*(.+)$/im;

/**
 * Status phrase written inside prose, e.g. "... the verification status: false".
 */
export function findInlineStatus(text: string): string | undefined {
  return INLINE_STATUS.exec(text)?.[1]?.trim();
}
