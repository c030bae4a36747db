// ═══════════════════════════════════════════════════════════════════════════════
// CLI TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import { buildProcessResult } from '../../factcheck/record.js';
import { createAnalysis, createJudgment, createQuestion } from '../../factcheck/types.js';
import { formatSummary, parseCliArgs, runCli, USAGE, type CliIo } from '../run.js';

const RESULT = buildProcessResult({
  questions: [createQuestion('Is the Eiffel Tower located in Berlin?')],
  factChecks: [
    {
      question: 'Is the Eiffel Tower located in Berlin?',
      analysis: createAnalysis({ status: 'FALSE', confidence: 0.95, reasoning: 'It is in Paris.' }),
    },
  ],
  judgment: createJudgment('FAKE', 0.95, 'One strong contradiction.'),
  processingTimeMs: 12,
});

function captureIo(): CliIo & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
  };
}

describe('parseCliArgs', () => {
  it('should join positionals into the content', () => {
    expect(parseCliArgs(['The', 'Eiffel', 'Tower', 'is', 'in', 'Berlin.'])).toEqual({
      ok: true,
      value: { json: false, help: false, concurrency: undefined, content: 'The Eiffel Tower is in Berlin.' },
    });
  });

  it('should read flags', () => {
    const result = parseCliArgs(['--json', '--concurrency', '3', 'claim']);
    expect(result.ok && result.value).toEqual({ json: true, help: false, concurrency: 3, content: 'claim' });
  });

  it('should reject a bad concurrency', () => {
    expect(parseCliArgs(['--concurrency', 'two', 'claim'])).toEqual({
      ok: false,
      error: '--concurrency must be an integer from 1 to 10, got "two"',
    });
  });

  it('should reject missing content and unknown flags', () => {
    expect(parseCliArgs([])).toEqual({ ok: false, error: 'No content given' });
    expect(parseCliArgs(['--verbose', 'claim']).ok).toBe(false);
  });
});

describe('formatSummary', () => {
  it('should render verdict, checks and metadata', () => {
    expect(formatSummary(RESULT)).toBe(
      [
        'Judgment: FAKE (confidence 0.95)',
        '',
        'One strong contradiction.',
        '',
        'Fact checks:',
        '  1. Is the Eiffel Tower located in Berlin?',
        '     FALSE (0.95)',
        '',
        'Source quality: 0.00 - No sources provided for evaluation.',
        'Processing time: 12 ms',
      ].join('\n')
    );
  });
});

describe('runCli', () => {
  it('should print raw JSON with --json', async () => {
    const io = captureIo();
    const processFn = vi.fn(async (_content: string) => RESULT);
    const factory = vi.fn(() => ({ process: processFn }));

    const code = await runCli(['--json', '-c', '2', 'claim'], io, factory);

    expect(code).toBe(0);
    expect(factory).toHaveBeenCalledWith({ concurrency: 2 });
    expect(processFn).toHaveBeenCalledWith('claim');
    expect(JSON.parse(io.stdout[0] ?? '')).toEqual(RESULT);
  });

  it('should exit 1 with usage on bad arguments', async () => {
    const io = captureIo();
    const factory = vi.fn(() => ({ process: async () => RESULT }));

    const code = await runCli([], io, factory);

    expect(code).toBe(1);
    expect(io.stderr).toEqual([`No content given\n${USAGE}`]);
    expect(factory).not.toHaveBeenCalled();
  });

  it('should print usage for --help', async () => {
    const io = captureIo();

    expect(await runCli(['--help'], io, vi.fn())).toBe(0);
    expect(io.stdout).toEqual([USAGE]);
  });
});
