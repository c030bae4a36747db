// ═══════════════════════════════════════════════════════════════════════════════
// SECTION SCANNER — Heading Table and Line-by-Line Segmentation
// ═══════════════════════════════════════════════════════════════════════════════
//
// The scanner has two kinds of state: PREAMBLE (before any heading) and
// SECTION(key). Every line either matches a heading in SECTION_HEADINGS,
// which flushes the open section and moves to SECTION(key), or is appended
// to the buffer of the current state. A repeated heading restarts its
// section, so the last occurrence wins. Inside a section, a bare generic
// word ("Analysis:", "Status:") only counts as a heading when it carries an
// ordinal or markdown marker; otherwise it is body text.
//
// Accepted heading forms (case-insensitive):
//   1. Verification Status: FALSE
//   Verification Status
//   **2. Confidence Score:** 0.9
//   ### Evidence Gaps
//   Status - VERIFIED
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// HEADING TABLE
// ─────────────────────────────────────────────────────────────────────────────────

export type SectionKey =
  | 'status'
  | 'confidence'
  | 'supporting'
  | 'contradicting'
  | 'reasoning'
  | 'gaps'
  | 'recommendations'
  | 'sourceEvaluations';

export interface SectionHeading {
  readonly key: SectionKey;
  readonly aliases: readonly string[];
}

export const SECTION_HEADINGS: readonly SectionHeading[] = [
  { key: 'status', aliases: ['verification status', 'status', 'verdict'] },
  { key: 'confidence', aliases: ['confidence score', 'confidence level', 'confidence'] },
  { key: 'supporting', aliases: ['supporting evidence', 'evidence supporting the claim', 'evidence for'] },
  {
    key: 'contradicting',
    aliases: ['contradicting evidence', 'contradictory evidence', 'evidence contradicting the claim', 'evidence against'],
  },
  { key: 'reasoning', aliases: ['reasoning', 'explanation', 'analysis'] },
  { key: 'gaps', aliases: ['evidence gaps', 'gaps in evidence', 'gaps', 'missing evidence'] },
  { key: 'recommendations', aliases: ['recommendations', 'recommendation', 'recommended next steps'] },
  { key: 'sourceEvaluations', aliases: ['source evaluations', 'source evaluation', 'source assessment'] },
];

/** Aliases common enough in prose to need a marker inside an open section */
export const GENERIC_ALIASES: ReadonlySet<string> = new Set(['analysis', 'explanation', 'verdict', 'status', 'gaps']);

function normalizeAlias(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

const ALIAS_TO_KEY: ReadonlyMap<string, SectionKey> = new Map(
  SECTION_HEADINGS.flatMap((heading) => heading.aliases.map((alias) => [alias, heading.key] as const))
);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Longest aliases first so "evidence gaps" is not read as a shorter alias
const ALIAS_PATTERN = [...ALIAS_TO_KEY.keys()]
  .sort((a, b) => b.length - a.length)
  .map((alias) => escapeRegExp(alias).replace(/ /g, '\\s+'))
  .join('|');

const EMPHASIS = '(?:\\*\\*|__)?';

const HEADING_PATTERN = new RegExp(
  '^\\s*(?:#{1,6}\\s*)?' + EMPHASIS + '\\s*' +
  '(?:\\d{1,2}\\s*[.)]\\s*)?' + EMPHASIS + '\\s*' +
  `(${ALIAS_PATTERN})` +
  '\\s*' + EMPHASIS + '\\s*' +
  '(?:[:\\-–]\\s*' + EMPHASIS + '\\s*(.*?))?\\s*$',
  'i'
);

export interface HeadingMatch {
  readonly key: SectionKey;
  /** Body text on the heading line itself, after the separator */
  readonly inline: string;
}

function stripEmphasis(text: string): string {
  return text.replace(/^(?:\*\*|__)\s*/, '').replace(/\s*(?:\*\*|__)$/, '').trim();
}

const HEADING_MARKER = /^\s*(?:#|\*\*|__|\d{1,2}\s*[.)])/;

/**
 * Match one line against the heading table. With `inSection` set, generic
 * aliases need an ordinal, `#` or bold marker to count.
 */
export function matchHeading(line: string, inSection: boolean = false): HeadingMatch | null {
  const match = HEADING_PATTERN.exec(line);
  const alias = match?.[1];
  if (!match || alias === undefined) {
    return null;
  }

  const normalized = normalizeAlias(alias);
  const key = ALIAS_TO_KEY.get(normalized);
  if (!key) {
    return null;
  }

  if (inSection && GENERIC_ALIASES.has(normalized) && !HEADING_MARKER.test(line)) {
    return null;
  }

  return { key, inline: stripEmphasis(match[2] ?? '') };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCANNER
// ─────────────────────────────────────────────────────────────────────────────────

export type ScannerState =
  | { readonly kind: 'preamble' }
  | { readonly kind: 'section'; readonly key: SectionKey };

export interface SegmentedResponse {
  /** Lines before the first heading */
  readonly preamble: readonly string[];
  readonly sections: ReadonlyMap<SectionKey, readonly string[]>;
}

export class SectionScanner {
  private state: ScannerState = { kind: 'preamble' };
  private buffer: string[] = [];
  private readonly preamble: string[] = [];
  private readonly sections = new Map<SectionKey, string[]>();

  getState(): ScannerState {
    return this.state;
  }

  feed(line: string): void {
    const heading = matchHeading(line, this.state.kind === 'section');

    if (heading) {
      this.flush();
      this.state = { kind: 'section', key: heading.key };
      this.buffer = heading.inline ? [heading.inline] : [];
      return;
    }

    if (this.state.kind === 'preamble') {
      this.preamble.push(line);
    } else {
      this.buffer.push(line);
    }
  }

  finish(): SegmentedResponse {
    this.flush();
    return { preamble: [...this.preamble], sections: new Map(this.sections) };
  }

  private flush(): void {
    if (this.state.kind === 'section') {
      this.sections.set(this.state.key, this.buffer);
    }
    this.buffer = [];
  }
}

export function segmentSections(text: string): SegmentedResponse {
  const scanner = new SectionScanner();
  for (const line of text.split(/\r?\n/)) {
    scanner.feed(line);
  }
  return scanner.finish();
}

/**
 * Non-blank lines of a section, trimmed.
 */
export function sectionLines(segmented: SegmentedResponse, key: SectionKey): string[] {
  return (segmented.sections.get(key) ?? []).map((line) => line.trim()).filter((line) => line.length > 0);
}

export function sectionText(segmented: SegmentedResponse, key: SectionKey): string {
  return sectionLines(segmented, key).join('\n');
}
