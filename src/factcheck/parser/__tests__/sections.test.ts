// ═══════════════════════════════════════════════════════════════════════════════
// SECTION SCANNER TESTS — Heading Table Transitions
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { matchHeading, segmentSections, sectionLines, SectionScanner } from '../sections.js';

describe('matchHeading', () => {
  it.each([
    ['1. Verification Status: FALSE', 'status', 'FALSE'],
    ['Verification Status', 'status', ''],
    ['verification status:', 'status', ''],
    ['**2. Confidence Score:** 0.9', 'confidence', '0.9'],
    ['2) **Confidence**: 85%', 'confidence', '85%'],
    ['### Evidence Gaps', 'gaps', ''],
    ['1) Supporting Evidence -  strong', 'supporting', 'strong'],
    ['4. Contradicting Evidence:', 'contradicting', ''],
    ['Reasoning: The tower is in Paris.', 'reasoning', 'The tower is in Paris.'],
    ['Gaps', 'gaps', ''],
    ['7. Recommendations', 'recommendations', ''],
    ['8. Source Evaluations:', 'sourceEvaluations', ''],
  ] as const)('should read %j as %s', (line, key, inline) => {
    expect(matchHeading(line)).toEqual({ key, inline });
  });

  it.each([
    ['Analysis: the claim conflates two cities.', null],
    ['Status: unchanged since 1889', null],
    ['3. Analysis: the claim conflates two cities.', 'reasoning'],
    ['**Verdict:** FALSE', 'status'],
    ['## Gaps', 'gaps'],
    ['Confidence Score: 0.8', 'confidence'],
  ] as const)('should read %j inside an open section as %s', (line, key) => {
    expect(matchHeading(line, true)?.key ?? null).toBe(key);
  });

  it.each([
    'The status of the tower is unclear',
    '- Status: inside a bullet',
    'Confidence in this source is high',
    '1. Consult an official tourism site.',
    '',
  ])('should not treat %j as a heading', (line) => {
    expect(matchHeading(line)).toBeNull();
  });
});

describe('SectionScanner', () => {
  it('should start in the preamble and move to a section on a heading', () => {
    const scanner = new SectionScanner();
    expect(scanner.getState()).toEqual({ kind: 'preamble' });

    scanner.feed('Here is my assessment.');
    expect(scanner.getState()).toEqual({ kind: 'preamble' });

    scanner.feed('5. Reasoning:');
    expect(scanner.getState()).toEqual({ kind: 'section', key: 'reasoning' });

    scanner.feed('Sources agree.');
    const result = scanner.finish();

    expect(result.preamble).toEqual(['Here is my assessment.']);
    expect(result.sections.get('reasoning')).toEqual(['Sources agree.']);
  });

  it('should keep inline heading text as the first body line', () => {
    const result = segmentSections('Reasoning: first line\nsecond line');
    expect(result.sections.get('reasoning')).toEqual(['first line', 'second line']);
  });

  it('should let the last occurrence of a repeated heading win', () => {
    const result = segmentSections('Reasoning: draft\n2. Status: FALSE\nReasoning: final');
    expect(result.sections.get('reasoning')).toEqual(['final']);
    expect(result.sections.get('status')).toEqual(['FALSE']);
  });

  it('should keep a bare generic label as body text of the open section', () => {
    const scanner = new SectionScanner();
    scanner.feed('5. Reasoning:');
    scanner.feed('All sources place it in Paris.');
    scanner.feed('Analysis: the claim conflates two cities.');
    expect(scanner.getState()).toEqual({ kind: 'section', key: 'reasoning' });

    expect(scanner.finish().sections.get('reasoning')).toEqual([
      'All sources place it in Paris.',
      'Analysis: the claim conflates two cities.',
    ]);
  });

  it('should still open a section on a bare generic label in the preamble', () => {
    const result = segmentSections('Here is my view.\nAnalysis: sources agree.');
    expect(result.preamble).toEqual(['Here is my view.']);
    expect(result.sections.get('reasoning')).toEqual(['sources agree.']);
  });

  it('should switch sections on a numbered generic label', () => {
    const result = segmentSections('5. Reasoning:\nAll sources agree.\n6. Gaps:\n- Opening year');
    expect(result.sections.get('reasoning')).toEqual(['All sources agree.']);
    expect(result.sections.get('gaps')).toEqual(['- Opening year']);
  });

  it('should return trimmed non-blank section lines', () => {
    const result = segmentSections('Supporting Evidence:\n  - one  \n\n- two');
    expect(sectionLines(result, 'supporting')).toEqual(['- one', '- two']);
    expect(sectionLines(result, 'gaps')).toEqual([]);
  });
});
