// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Loggers with Context & Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// - JSON lines in production, colored single lines in development
// - Request ID injected from AsyncLocalStorage
// - Secret redaction on every entry
// - Component-based child loggers
//
// Usage:
//   const logger = getLogger({ component: 'judge' });
//   logger.info('Judgment reached', { verdict: 'FAKE' });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLoggingContext } from './context.js';
import { redact, type RedactionOptions } from './redaction.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;

  /** Colored single-line output instead of JSON */
  pretty?: boolean;

  redact?: boolean;

  redactionOptions?: RedactionOptions;

  serviceName?: string;

  environment?: string;

  timestamp?: boolean;

  /** Destination; defaults to the console */
  sink?: (level: LogLevel, line: string) => void;
}

export interface LoggerOptions {
  component?: string;

  /** Request ID (taken from context if not provided) */
  requestId?: string;

  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

function defaultConfig(): LoggerConfig {
  return {
    level: 'info',
    pretty: process.env.NODE_ENV !== 'production',
    redact: true,
    serviceName: 'veracity-engine',
    environment: process.env.NODE_ENV ?? 'development',
    timestamp: true,
  };
}

let globalConfig: LoggerConfig = defaultConfig();

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * LOG_LEVEL in the environment wins over configured level.
 */
function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

export function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause !== undefined ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  const entry: Record<string, unknown> = {
    level,
    levelNum: LOG_LEVELS[level],
    time: globalConfig.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(component && { component }),
    ...getLoggingContext(),
    ...context,
  };

  return globalConfig.redact ? redact(entry, globalConfig.redactionOptions) : entry;
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const STANDARD_FIELDS = new Set(['level', 'levelNum', 'time', 'msg', 'service', 'env', 'component', 'requestId']);

function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const time = typeof entry.time === 'string' ? entry.time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const component = typeof entry.component === 'string' ? `[${entry.component}]` : '';
  const requestId = typeof entry.requestId === 'string' ? `[${entry.requestId.slice(0, 8)}]` : '';

  const contextFields = Object.fromEntries(
    Object.entries(entry).filter(([key, value]) => !STANDARD_FIELDS.has(key) && value !== undefined)
  );
  const contextStr = Object.keys(contextFields).length > 0
    ? ` ${DIM}${JSON.stringify(contextFields)}${RESET}`
    : '';

  return `${DIM}${time}${RESET} ${COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET} ${requestId}${component} ${String(entry.msg)}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function consoleSink(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'fatal') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  const line = globalConfig.pretty ? prettyPrint(level, entry) : JSON.stringify(entry);
  (globalConfig.sink ?? consoleSink)(level, line);
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): ILogger {
  const { component, requestId, context: baseContext = {} } = options;

  const enabled = (level: LogLevel): boolean => LOG_LEVELS[level] >= LOG_LEVELS[getEffectiveLevel()];

  const log = (
    level: LogLevel,
    message: string,
    context: Record<string, unknown> = {},
    errorContext: Record<string, unknown> = {}
  ): void => {
    if (!enabled(level)) {
      return;
    }

    const fullContext = {
      ...(requestId && { requestId }),
      ...baseContext,
      ...context,
      ...errorContext,
    };

    writeLog(level, formatLogEntry(level, message, fullContext, component));
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) =>
      log('error', message, context, error !== undefined ? formatError(error) : {}),
    fatal: (message, error, context) =>
      log('fatal', message, context, error !== undefined ? formatError(error) : {}),

    child: (childOptions: LoggerOptions): ILogger =>
      createLogger({
        component: childOptions.component ?? component,
        requestId: childOptions.requestId ?? requestId,
        context: { ...baseContext, ...childOptions.context },
      }),

    isLevelEnabled: enabled,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or a component child of it.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }

  return options ? rootLogger.child(options) : rootLogger;
}

/**
 * Reset the root logger and its configuration (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
  globalConfig = defaultConfig();
}

/**
 * Measure and log execution time of an async operation.
 */
export async function withTiming<T>(
  name: string,
  fn: () => Promise<T>,
  logger: ILogger = getLogger({ component: 'perf' })
): Promise<T> {
  const start = performance.now();

  try {
    const result = await fn();
    logger.debug(`${name} completed`, { durationMs: Number((performance.now() - start).toFixed(2)) });
    return result;
  } catch (error) {
    logger.error(`${name} failed`, error, { durationMs: Number((performance.now() - start).toFixed(2)) });
    throw error;
  }
}
