// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING CONTEXT — Request-Scoped Fields via AsyncLocalStorage
// ═══════════════════════════════════════════════════════════════════════════════

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LoggingContext {
  readonly requestId?: string;
  readonly [key: string]: unknown;
}

const storage = new AsyncLocalStorage<LoggingContext>();

/**
 * Run a function with fields attached to every log entry written inside it.
 */
export function runWithContext<T>(context: LoggingContext, fn: () => T): T {
  const parent = storage.getStore() ?? {};
  return storage.run({ ...parent, ...context }, fn);
}

export function getLoggingContext(): LoggingContext {
  return storage.getStore() ?? {};
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}
