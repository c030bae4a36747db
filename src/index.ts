// ═══════════════════════════════════════════════════════════════════════════════
// VERACITY ENGINE — Library Exports
// ═══════════════════════════════════════════════════════════════════════════════

export * from './factcheck/index.js';
export { bootstrap, createPipeline, createServices, createLimiter, type Runtime, type Services } from './bootstrap.js';
export { createApp, type AppDependencies } from './api/app.js';
export { loadConfig, getConfig, resetConfig, loadTestConfig, type AppConfig } from './config/index.js';
export { getLogger, configureLogger, type ILogger } from './observability/logging/index.js';
export {
  RateLimiter,
  RateLimitExceededError,
  QuotaExceededError,
  unlimited,
  type CallLimiter,
} from './infrastructure/rate-limit/index.js';
export { OpenAILanguageModel, LanguageModelError, type LanguageModel } from './services/llm/index.js';
export {
  TavilySearchProvider,
  WikipediaSearchProvider,
  type SearchProvider,
  type SearchResult,
  type SearchResponse,
} from './services/search/index.js';
