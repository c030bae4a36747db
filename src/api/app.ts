// ═══════════════════════════════════════════════════════════════════════════════
// HTTP APP — Express Application Assembly
// ═══════════════════════════════════════════════════════════════════════════════
//
// Middleware order:
//   request id → CORS → JSON body → routes → 404 → error handler
//
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express } from 'express';
import type { ServerConfig } from '../config/schema.js';
import { cors } from './middleware/cors.js';
import { errorHandler, NotFoundError } from './middleware/error-handler.js';
import { requestId } from './middleware/request-id.js';
import { createHealthRouter, type HealthProviders } from './routes/health.js';
import { createProcessRouter, type ContentProcessor } from './routes/process.js';

export interface AppDependencies {
  readonly processor: ContentProcessor;
  readonly providers: HealthProviders;
  readonly server: Pick<ServerConfig, 'corsOrigins' | 'bodyLimit'>;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestId());
  app.use(cors(deps.server.corsOrigins));
  app.use(express.json({ limit: deps.server.bodyLimit }));

  app.use(createHealthRouter(deps.providers));
  app.use('/api', createProcessRouter(deps.processor));

  app.use((req, _res, next) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
