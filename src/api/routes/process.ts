// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS ROUTE — Run the Fact-Checking Pipeline on Submitted Content
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   POST   /process             Assess content, respond with the result record
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { ProcessResult } from '../../factcheck/record.js';
import { getLogger } from '../../observability/logging/index.js';
import { asyncHandler } from '../middleware/error-handler.js';

const logger = getLogger({ component: 'process-route' });

export const MAX_CONTENT_CHARS = 20000;

export const ProcessRequestSchema = z.object({
  content: z
    .string()
    .min(1, 'Content is required')
    .max(MAX_CONTENT_CHARS, `Content must be at most ${MAX_CONTENT_CHARS} characters`),
});

export type ProcessRequest = z.infer<typeof ProcessRequestSchema>;

/** Anything that turns content into a result record */
export interface ContentProcessor {
  process(content: string): Promise<ProcessResult>;
}

export function processHandler(processor: ContentProcessor): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { content } = ProcessRequestSchema.parse(req.body);

    logger.info('Processing content', { chars: content.length });
    const result = await processor.process(content);
    logger.info('Content processed', {
      judgment: result.judgment,
      confidence: result.judgment_confidence,
      ms: result.metadata.processing_time_ms,
    });

    res.json(result);
  });
}

export function createProcessRouter(processor: ContentProcessor): Router {
  const router = Router();
  router.post('/process', processHandler(processor));
  return router;
}
