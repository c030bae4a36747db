// ═══════════════════════════════════════════════════════════════════════════════
// STATUS NORMALIZATION TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { normalizeStatus, parseBareNumber, statusFromConfidence, findInlineStatus } from '../status.js';

describe('normalizeStatus', () => {
  it.each([
    ['VERIFIED', 'VERIFIED'],
    ['The claim is CONFIRMED by multiple sources', 'VERIFIED'],
    ['True', 'VERIFIED'],
    ['FALSE', 'FALSE'],
    ['Not true', 'FALSE'],
    ['Untrue', 'FALSE'],
    ['Incorrect', 'FALSE'],
    ['PARTIALLY_TRUE', 'PARTIALLY_TRUE'],
    ['Partially true, with caveats', 'PARTIALLY_TRUE'],
    ['MISLEADING', 'MISLEADING'],
    ['UNSUBSTANTIATED', 'UNSUBSTANTIATED'],
    ['Unverified', 'UNSUBSTANTIATED'],
    ['UNABLE_TO_VERIFY', 'UNABLE_TO_VERIFY'],
    ['Cannot verify with the available evidence', 'UNABLE_TO_VERIFY'],
    ['Insufficient evidence', 'UNABLE_TO_VERIFY'],
  ] as const)('should map %j to %s', (text, status) => {
    expect(normalizeStatus(text)).toEqual({ status, matched: true });
  });

  it.each([
    ['FALSE - there is no evidence the tower was ever in Berlin', 'FALSE'],
    ['VERIFIED - accurate and not misleading', 'VERIFIED'],
    ['**Partially_True** (the year is wrong)', 'PARTIALLY_TRUE'],
    ['Unable to verify, though it looks false', 'UNABLE_TO_VERIFY'],
  ] as const)('should prefer the leading keyword in %j', (text, status) => {
    expect(normalizeStatus(text)).toEqual({ status, matched: true });
  });

  it.each([
    ['The claim is accurate and not misleading', 'VERIFIED'],
    ['Mostly incorrect, though partly accurate', 'FALSE'],
    ['Likely misleading rather than false', 'MISLEADING'],
  ] as const)('should take the earliest synonym in %j', (text, status) => {
    expect(normalizeStatus(text)).toEqual({ status, matched: true });
  });

  it('should default unknown text to UNABLE_TO_VERIFY', () => {
    expect(normalizeStatus('see below')).toEqual({ status: 'UNABLE_TO_VERIFY', matched: false });
  });

  it('should read a bare number as an implied confidence', () => {
    expect(normalizeStatus('0.85')).toEqual({ status: 'VERIFIED', impliedConfidence: 0.85, matched: true });
    expect(normalizeStatus('**30%**')).toEqual({ status: 'MISLEADING', impliedConfidence: 0.3, matched: true });
  });
});

describe('numeric status', () => {
  it('should scale percentages and clamp', () => {
    expect(parseBareNumber('85%')).toBe(0.85);
    expect(parseBareNumber('72')).toBe(0.72);
    expect(parseBareNumber('250')).toBe(1);
    expect(parseBareNumber('1')).toBe(1);
    expect(parseBareNumber('FALSE')).toBeUndefined();
  });

  it('should clamp decimals above 1 rather than scale them', () => {
    expect(parseBareNumber('1.5')).toBe(1);
    expect(parseBareNumber('2.0')).toBe(1);
  });

  it.each([
    [0.8, 'VERIFIED'],
    [0.79, 'PARTIALLY_TRUE'],
    [0.6, 'PARTIALLY_TRUE'],
    [0.4, 'UNABLE_TO_VERIFY'],
    [0.2, 'MISLEADING'],
    [0.19, 'FALSE'],
  ] as const)('should map %d to %s', (confidence, status) => {
    expect(statusFromConfidence(confidence)).toBe(status);
  });
});

describe('findInlineStatus', () => {
  it('should find a status phrase inside prose', () => {
    expect(findInlineStatus('Overall the verification status is false here.')).toBe('false here.');
    expect(findInlineStatus('No label in this text.')).toBeUndefined();
  });
});
