// ═══════════════════════════════════════════════════════════════════════════════
// SERVER ENTRY — HTTP API
// ═══════════════════════════════════════════════════════════════════════════════

import 'dotenv/config';
import { createApp } from './api/app.js';
import { bootstrap } from './bootstrap.js';
import { loadConfig } from './config/loader.js';
import { getLogger } from './observability/logging/index.js';

const config = loadConfig();
const runtime = bootstrap(config);
const logger = getLogger({ component: 'server' });

const app = createApp({
  processor: runtime.pipeline,
  providers: {
    llm: runtime.model,
    webSearch: runtime.webSearch,
    encyclopedia: runtime.encyclopedia,
  },
  server: config.server,
});

const server = app.listen(config.server.port, () => {
  logger.info('Server listening', {
    port: config.server.port,
    environment: config.environment,
    llm: runtime.model.name,
    llmAvailable: runtime.model.isAvailable(),
    webSearchAvailable: runtime.webSearch.isAvailable(),
  });
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal, limiters: runtime.limiters.map((limiter) => limiter.getStats()) });
  server.close((error) => {
    if (error) {
      logger.error('Server close failed', error);
      process.exitCode = 1;
    }
  });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
