// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Schema, Environment Loading, Cached Access
// ═══════════════════════════════════════════════════════════════════════════════

export {
  AppConfigSchema,
  EnvironmentSchema,
  RateLimitPolicySchema,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  getDefaultConfig,
  type AppConfig,
  type AppConfigInput,
  type Environment,
  type ServerConfig,
  type LLMConfig,
  type SearchConfig,
  type RateLimitPolicyConfig,
  type VerifierConfig,
  type JudgeConfig,
  type PipelineConfig,
  type ConfidencePrecedence,
} from './schema.js';

export {
  envBool,
  envNumber,
  envFloat,
  envString,
  envOptional,
  envList,
  ConfigValidationError,
  getEnvironment,
  readEnvironment,
  loadConfig,
  getConfig,
  isConfigLoaded,
  resetConfig,
  loadTestConfig,
  isProduction,
  isDevelopment,
} from './loader.js';
