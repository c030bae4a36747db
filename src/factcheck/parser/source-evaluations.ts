// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE EVALUATIONS — Per-Source YES/NO Verdict Lines
// ═══════════════════════════════════════════════════════════════════════════════

import type { SourceEvaluation } from '../types.js';
import { splitListItems } from './lists.js';

/**
 * `{source}: YES - {reason}`, also `{source} - NO: {reason}` and
 * `{source} (YES) {reason}`. The source is matched lazily so URLs and
 * hyphenated domains stay whole.
 */
const EVALUATION_LINE =
  /^(.+?)\s*(?:[:\-–]|\()\s*\**\s*(YES|NO)\b\s*\**\s*\)?\s*(?:[:\-–,.]\s*)?(.*)$/i;

function cleanSource(source: string): string {
  return source
    .replace(/^\*\*|\*\*$/g, '')
    .replace(/^[[\]<>"']+|[[\]<>"']+$/g, '')
    .trim();
}

export function parseSourceEvaluation(item: string): SourceEvaluation | null {
  const match = EVALUATION_LINE.exec(item.trim());
  const source = match?.[1];
  const verdict = match?.[2];
  if (!match || source === undefined || verdict === undefined) {
    return null;
  }

  const cleaned = cleanSource(source);
  if (!cleaned) {
    return null;
  }

  return {
    source: cleaned,
    verdict: verdict.toUpperCase() === 'YES' ? 'YES' : 'NO',
    reason: (match[3] ?? '').trim(),
  };
}

/**
 * Items of a source-evaluation section that carry a verdict; others are skipped.
 */
export function parseSourceEvaluations(lines: readonly string[]): SourceEvaluation[] {
  return splitListItems(lines)
    .map(parseSourceEvaluation)
    .filter((evaluation): evaluation is SourceEvaluation => evaluation !== null);
}
