// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Classes and Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every error response has the same body:
//   { error, code, details?, requestId?, timestamp }
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { getLogger, getRequestId } from '../../observability/logging/index.js';

const logger = getLogger({ component: 'error-handler' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = 'BAD_REQUEST',
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CODE MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

/** Status codes for the limiter and provider errors raised below the HTTP layer */
const CODE_STATUS: Readonly<Record<string, number>> = {
  RATE_LIMITED: 429,
  QUOTA_EXCEEDED: 429,
  PROVIDER_ERROR: 502,
};

export interface ErrorBody {
  readonly error: string;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly requestId?: string;
  readonly timestamp: string;
}

interface Resolved {
  readonly status: number;
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

function hasCode(error: unknown): error is { code: string; message?: unknown } {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

function resolve(error: unknown): Resolved {
  if (error instanceof ApiError) {
    return { status: error.statusCode, code: error.code, message: error.message, details: error.details };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      code: 'VALIDATION_ERROR',
      message: 'Invalid request',
      details: { fields: error.flatten().fieldErrors },
    };
  }

  if (isJsonSyntaxError(error)) {
    return { status: 400, code: 'INVALID_JSON', message: 'Invalid JSON in request body' };
  }

  if (hasCode(error)) {
    const status = CODE_STATUS[error.code];
    if (status !== undefined) {
      const message = typeof error.message === 'string' ? error.message : error.code;
      return { status, code: error.code, message };
    }
  }

  return {
    status: 500,
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Internal server error',
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const resolved = resolve(error);
  const production = process.env.NODE_ENV === 'production';
  const requestId = req.requestId ?? getRequestId();

  if (resolved.status >= 500) {
    logger.error('Request failed', error, { path: req.path, method: req.method, code: resolved.code });
  } else {
    logger.warn('Request rejected', { path: req.path, method: req.method, code: resolved.code });
  }

  const sanitize = production && resolved.status >= 500;

  const body: ErrorBody = {
    error: sanitize ? 'An unexpected error occurred' : resolved.message,
    code: resolved.code,
    ...(!sanitize && resolved.details !== undefined && { details: resolved.details }),
    ...(requestId !== undefined && { requestId }),
    timestamp: new Date().toISOString(),
  };

  res.status(resolved.status).json(body);
}

/**
 * Wrap an async route handler so rejections reach the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => fn(req, res, next).catch(next);
}
