// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE EVALUATION TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { parseSourceEvaluation, parseSourceEvaluations } from '../source-evaluations.js';

describe('parseSourceEvaluation', () => {
  it('should keep a URL source whole', () => {
    expect(parseSourceEvaluation('https://example.org/paris: YES - Confirms the location.')).toEqual({
      source: 'https://example.org/paris',
      verdict: 'YES',
      reason: 'Confirms the location.',
    });
  });

  it('should keep hyphenated domains whole', () => {
    expect(parseSourceEvaluation('truth-rumor.xyz: no - Anonymous rumor site')).toEqual({
      source: 'truth-rumor.xyz',
      verdict: 'NO',
      reason: 'Anonymous rumor site',
    });
  });

  it('should accept a dash separator and a parenthesised verdict', () => {
    expect(parseSourceEvaluation('Wikipedia - YES: Article agrees')).toEqual({
      source: 'Wikipedia',
      verdict: 'YES',
      reason: 'Article agrees',
    });
    expect(parseSourceEvaluation('Wikipedia (NO) Article disagrees')).toEqual({
      source: 'Wikipedia',
      verdict: 'NO',
      reason: 'Article disagrees',
    });
  });

  it('should reject lines without a verdict', () => {
    expect(parseSourceEvaluation('Wikipedia: relevant background')).toBeNull();
  });
});

describe('parseSourceEvaluations', () => {
  it('should parse bulleted items and skip the rest', () => {
    const evaluations = parseSourceEvaluations([
      '- https://a.example/1: YES - agrees',
      '- a note without a verdict',
      '- https://b.example/2: NO - disagrees',
    ]);

    expect(evaluations.map((e) => [e.source, e.verdict])).toEqual([
      ['https://a.example/1', 'YES'],
      ['https://b.example/2', 'NO'],
    ]);
  });
});
