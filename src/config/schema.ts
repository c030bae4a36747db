// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Zod Validation for Application Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'production']);

export type Environment = z.infer<typeof EnvironmentSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3001),
  corsOrigins: z.array(z.string()).default(['http://localhost:3000', 'http://localhost:3001']),
  bodyLimit: z.string().default('100kb'),
});

export const LLMConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default('gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().int().positive().default(1500),
  timeoutMs: z.number().int().positive().default(30000),
});

export const SearchConfigSchema = z.object({
  tavilyApiKey: z.string().min(1).optional(),
  webMaxResults: z.number().int().min(1).max(20).default(5),
  encyclopediaMaxResults: z.number().int().min(1).max(20).default(3),
  excerptChars: z.number().int().min(50).default(500),
  timeoutMs: z.number().int().positive().default(10000),
});

/**
 * Pacing and backoff for one external service.
 */
export const RateLimitPolicySchema = z.object({
  /** Minimum spacing between two calls to the service */
  minIntervalMs: z.number().int().min(0).default(0),
  /** Base of the exponential backoff */
  baseDelayMs: z.number().int().min(0).default(1000),
  maxRetries: z.number().int().min(0).default(3),
  maxBackoffMs: z.number().int().min(0).default(60000),
  /** Calls allowed per UTC day; unlimited when absent */
  dailyQuota: z.number().int().positive().optional(),
});

export const RateLimitConfigSchema = z.object({
  llm: RateLimitPolicySchema.default({
    minIntervalMs: 1000,
    baseDelayMs: 10000,
    maxRetries: 5,
    maxBackoffMs: 120000,
  }),
  search: RateLimitPolicySchema.default({
    minIntervalMs: 0,
    baseDelayMs: 1000,
    maxRetries: 3,
    maxBackoffMs: 30000,
  }),
});

export const ConfidencePrecedenceSchema = z.enum(['explicit-first', 'votes-first']);

export const VerifierConfigSchema = z.object({
  requestSourceEvaluation: z.boolean().default(true),
  confidencePrecedence: ConfidencePrecedenceSchema.default('explicit-first'),
});

export const JudgeConfigSchema = z.object({
  /** A false-like check at or above this confidence decides FAKE */
  fakeConfidence: z.number().min(0).max(1).default(0.7),
  realRatio: z.number().min(0).max(1).default(0.6),
  realConfidence: z.number().min(0).max(1).default(0.7),
});

export const PipelineConfigSchema = z.object({
  maxQuestions: z.number().int().min(1).max(10).default(3),
  concurrency: z.number().int().min(1).max(10).default(1),
});

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  pretty: z.boolean().default(true),
});

// ─────────────────────────────────────────────────────────────────────────────────
// APP CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  server: ServerConfigSchema.default({}),
  llm: LLMConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  verifier: VerifierConfigSchema.default({}),
  judge: JudgeConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type RateLimitPolicyConfig = z.infer<typeof RateLimitPolicySchema>;
export type VerifierConfig = z.infer<typeof VerifierConfigSchema>;
export type JudgeConfig = z.infer<typeof JudgeConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type ConfidencePrecedence = z.infer<typeof ConfidencePrecedenceSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Validate raw configuration, throwing a ZodError on failure.
 */
export function validateConfig(input: unknown): AppConfig {
  return AppConfigSchema.parse(input);
}

export function safeValidateConfig(input: unknown): z.SafeParseReturnType<unknown, AppConfig> {
  return AppConfigSchema.safeParse(input);
}

/**
 * Render validation issues as `path: message` lines.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
