// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST ID — Correlation ID per Request
// ═══════════════════════════════════════════════════════════════════════════════

import type { RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithContext } from '../../observability/logging/index.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

const VALID_REQUEST_ID = /^[\w.:-]{1,128}$/;

/**
 * Incoming id when it is well formed, a new UUID otherwise.
 */
export function resolveRequestId(incoming: string | string[] | undefined): string {
  const candidate = Array.isArray(incoming) ? incoming[0] : incoming;
  return candidate !== undefined && VALID_REQUEST_ID.test(candidate) ? candidate : uuidv4();
}

/**
 * Echoes the id in the response and attaches it to every log entry written
 * while the request is handled.
 */
export function requestId(): RequestHandler {
  return (req, res, next) => {
    const id = resolveRequestId(req.headers[REQUEST_ID_HEADER]);
    req.requestId = id;
    res.setHeader(REQUEST_ID_HEADER, id);
    runWithContext({ requestId: id }, () => next());
  };
}
