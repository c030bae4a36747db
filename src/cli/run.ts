// ═══════════════════════════════════════════════════════════════════════════════
// CLI — Argument Parsing, Summary Formatting, One-Shot Run
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage: veracity [--json] [--concurrency N] <content...>
//
// Exit codes: 0 for any result record (ERROR verdicts included),
// 1 for usage errors.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { parseArgs } from 'node:util';
import type { ContentProcessor } from '../api/routes/process.js';
import type { ProcessResult } from '../factcheck/record.js';
import { err, ok, type Result } from '../types/result.js';

export const USAGE = 'Usage: veracity [--json] [--concurrency N] <content...>';

export interface CliOptions {
  readonly json: boolean;
  readonly help: boolean;
  readonly concurrency?: number;
  readonly content: string;
}

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

export type ProcessorFactory = (options: { readonly concurrency?: number }) => ContentProcessor;

// ─────────────────────────────────────────────────────────────────────────────────
// ARGUMENTS
// ─────────────────────────────────────────────────────────────────────────────────

interface RawArgs {
  readonly json: boolean;
  readonly help: boolean;
  readonly concurrency?: string;
  readonly positionals: readonly string[];
}

function readArgs(argv: readonly string[]): Result<RawArgs, string> {
  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        json: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
        concurrency: { type: 'string', short: 'c' },
      },
    });
    return ok({
      json: values.json === true,
      help: values.help === true,
      concurrency: values.concurrency,
      positionals,
    });
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: readonly string[]): Result<CliOptions, string> {
  const raw = readArgs(argv);
  if (!raw.ok) {
    return raw;
  }

  const { json, help, positionals } = raw.value;
  const content = positionals.join(' ').trim();

  let concurrency: number | undefined;
  if (raw.value.concurrency !== undefined) {
    concurrency = Number(raw.value.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > 10) {
      return err(`--concurrency must be an integer from 1 to 10, got "${raw.value.concurrency}"`);
    }
  }

  if (!content && !help) {
    return err('No content given');
  }

  return ok({ json, help, concurrency, content });
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

export function formatSummary(result: ProcessResult): string {
  const lines = [
    `Judgment: ${result.judgment} (confidence ${result.judgment_confidence.toFixed(2)})`,
    '',
    result.judgment_reason,
  ];

  if (result.fact_checks.length > 0) {
    lines.push('', 'Fact checks:');
    result.fact_checks.forEach((check, i) => {
      const { verification_status: status, confidence_score: confidence } = check.analysis;
      lines.push(`  ${i + 1}. ${check.question}`, `     ${status} (${confidence.toFixed(2)})`);
    });
  }

  const quality = result.metadata.source_quality;
  lines.push(
    '',
    `Source quality: ${quality.score.toFixed(2)} - ${quality.summary}`,
    `Processing time: ${result.metadata.processing_time_ms} ms`
  );

  return lines.join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────────
// RUN
// ─────────────────────────────────────────────────────────────────────────────────

export async function runCli(
  argv: readonly string[],
  io: CliIo,
  createProcessor: ProcessorFactory
): Promise<number> {
  const args = parseCliArgs(argv);

  if (!args.ok) {
    io.err(`${args.error}\n${USAGE}`);
    return 1;
  }

  if (args.value.help) {
    io.out(USAGE);
    return 0;
  }

  const processor = createProcessor({ concurrency: args.value.concurrency });
  const result = await processor.process(args.value.content);

  io.out(args.value.json ? JSON.stringify(result, null, 2) : formatSummary(result));
  return 0;
}
