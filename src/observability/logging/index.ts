// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export {
  LOG_LEVELS,
  type LogLevel,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  configureLogger,
  getLoggerConfig,
  createLogger,
  getLogger,
  resetLogger,
  formatError,
  withTiming,
} from './logger.js';

export {
  runWithContext,
  getLoggingContext,
  getRequestId,
  type LoggingContext,
} from './context.js';

export {
  redact,
  redactString,
  isSensitiveKey,
  DEFAULT_PATTERNS,
  type RedactionOptions,
  type RedactionPattern,
} from './redaction.js';
