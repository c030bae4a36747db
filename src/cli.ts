#!/usr/bin/env node
// ═══════════════════════════════════════════════════════════════════════════════
// CLI ENTRY — veracity
// ═══════════════════════════════════════════════════════════════════════════════

import 'dotenv/config';
import { bootstrap } from './bootstrap.js';
import { runCli } from './cli/run.js';
import { loadConfig } from './config/loader.js';
import { configureLogger, getLogger } from './observability/logging/index.js';

const stderrSink = (_level: string, line: string): void => {
  process.stderr.write(`${line}\n`);
};

try {
  process.exitCode = await runCli(
    process.argv.slice(2),
    {
      out: (text) => process.stdout.write(`${text}\n`),
      err: (text) => process.stderr.write(`${text}\n`),
    },
    ({ concurrency }) => {
      const config = loadConfig();
      const { pipeline } = bootstrap({
        ...config,
        pipeline: { ...config.pipeline, concurrency: concurrency ?? config.pipeline.concurrency },
        // LOG_LEVEL still overrides this
        logging: { ...config.logging, level: 'warn' },
      });
      // stdout carries the record
      configureLogger({ sink: stderrSink });
      return pipeline;
    }
  );
} catch (error) {
  getLogger({ component: 'cli' }).fatal('CLI failed', error);
  process.exitCode = 1;
}
