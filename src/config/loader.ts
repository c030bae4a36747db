// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG LOADER — Environment Mapping and Cached Access
// ═══════════════════════════════════════════════════════════════════════════════

import {
  AppConfigSchema,
  EnvironmentSchema,
  LogLevelSchema,
  ConfidencePrecedenceSchema,
  formatConfigErrors,
  type AppConfig,
  type AppConfigInput,
  type Environment,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

export function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function envFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function envOptional(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

export function envList(key: string, defaultValue: string[] = []): string[] {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export class ConfigValidationError extends Error {
  readonly name = 'ConfigValidationError';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

export function getEnvironment(): Environment {
  const parsed = EnvironmentSchema.safeParse(process.env.NODE_ENV);
  return parsed.success ? parsed.data : 'development';
}

/**
 * Build raw config input from process.env. Unset variables are left out so the
 * schema defaults apply.
 */
export function readEnvironment(): AppConfigInput {
  const environment = getEnvironment();
  const logLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL?.toLowerCase());
  const precedence = ConfidencePrecedenceSchema.safeParse(process.env.CONFIDENCE_PRECEDENCE);
  const dailyQuota = envNumber('LLM_DAILY_QUOTA', 0);

  return {
    environment,
    server: {
      port: envNumber('PORT', 3001),
      corsOrigins: envList('CORS_ORIGINS', ['http://localhost:3000', 'http://localhost:3001']),
    },
    llm: {
      apiKey: envOptional('OPENAI_API_KEY'),
      model: envString('LLM_MODEL', 'gpt-4o-mini'),
      temperature: envFloat('LLM_TEMPERATURE', 0.2),
      maxTokens: envNumber('LLM_MAX_TOKENS', 1500),
      timeoutMs: envNumber('LLM_TIMEOUT_MS', 30000),
    },
    search: {
      tavilyApiKey: envOptional('TAVILY_API_KEY'),
      webMaxResults: envNumber('WEB_MAX_RESULTS', 5),
      encyclopediaMaxResults: envNumber('ENCYCLOPEDIA_MAX_RESULTS', 3),
      excerptChars: envNumber('EVIDENCE_EXCERPT_CHARS', 500),
      timeoutMs: envNumber('SEARCH_TIMEOUT_MS', 10000),
    },
    rateLimit: {
      llm: {
        minIntervalMs: envNumber('LLM_MIN_INTERVAL_MS', 1000),
        baseDelayMs: envNumber('LLM_BASE_DELAY_MS', 10000),
        maxRetries: envNumber('LLM_MAX_RETRIES', 5),
        maxBackoffMs: envNumber('LLM_MAX_BACKOFF_MS', 120000),
        dailyQuota: dailyQuota > 0 ? dailyQuota : undefined,
      },
    },
    verifier: {
      requestSourceEvaluation: envBool('REQUEST_SOURCE_EVALUATION', true),
      ...(precedence.success && { confidencePrecedence: precedence.data }),
    },
    judge: {
      fakeConfidence: envFloat('JUDGE_FAKE_CONFIDENCE', 0.7),
      realRatio: envFloat('JUDGE_REAL_RATIO', 0.6),
      realConfidence: envFloat('JUDGE_REAL_CONFIDENCE', 0.7),
    },
    pipeline: {
      maxQuestions: envNumber('FACTCHECK_MAX_QUESTIONS', 3),
      concurrency: envNumber('FACTCHECK_CONCURRENCY', 1),
    },
    logging: {
      ...(logLevel.success && { level: logLevel.data }),
      pretty: envBool('LOG_PRETTY', environment !== 'production'),
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// CACHED ACCESS
// ─────────────────────────────────────────────────────────────────────────────────

let cachedConfig: AppConfig | null = null;

/**
 * Load, validate and cache configuration from the environment.
 */
export function loadConfig(): AppConfig {
  const result = AppConfigSchema.safeParse(readEnvironment());
  if (!result.success) {
    throw new ConfigValidationError(formatConfigErrors(result.error));
  }
  cachedConfig = result.data;
  return cachedConfig;
}

export function getConfig(): AppConfig {
  return cachedConfig ?? loadConfig();
}

export function isConfigLoaded(): boolean {
  return cachedConfig !== null;
}

/**
 * Reset cached configuration (for testing).
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Load a test configuration without reading the environment.
 */
export function loadTestConfig(overrides: AppConfigInput = {}): AppConfig {
  cachedConfig = AppConfigSchema.parse({
    environment: 'test',
    logging: { level: 'error', pretty: false },
    ...overrides,
  });
  return cachedConfig;
}

export function isProduction(): boolean {
  return getConfig().environment === 'production';
}

export function isDevelopment(): boolean {
  return getConfig().environment === 'development';
}
