// ═══════════════════════════════════════════════════════════════════════════════
// BOOTSTRAP — Build the Pipeline and Its Clients from Configuration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each external service gets its own RateLimiter; the limiter is the only
// state shared between concurrent questions.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { AppConfig, RateLimitPolicyConfig } from './config/schema.js';
import { EvidenceGatherer } from './factcheck/evidence.js';
import { FactCheckPipeline } from './factcheck/pipeline.js';
import { QuestionGenerator } from './factcheck/questions.js';
import { ClaimVerifier } from './factcheck/verifier.js';
import { RateLimiter } from './infrastructure/rate-limit/limiter.js';
import { configureLogger } from './observability/logging/index.js';
import { OpenAILanguageModel } from './services/llm/openai.js';
import type { LanguageModel } from './services/llm/types.js';
import { TavilySearchProvider } from './services/search/tavily.js';
import type { SearchProvider } from './services/search/types.js';
import { WikipediaSearchProvider } from './services/search/wikipedia.js';

export interface Services {
  readonly model: LanguageModel;
  readonly webSearch: SearchProvider;
  readonly encyclopedia: SearchProvider;
  readonly limiters: readonly RateLimiter[];
}

export interface Runtime extends Services {
  readonly pipeline: FactCheckPipeline;
}

export function createLimiter(name: string, policy: RateLimitPolicyConfig): RateLimiter {
  return new RateLimiter({
    name,
    minIntervalMs: policy.minIntervalMs,
    baseDelayMs: policy.baseDelayMs,
    maxRetries: policy.maxRetries,
    maxBackoffMs: policy.maxBackoffMs,
    dailyQuota: policy.dailyQuota,
  });
}

export function createServices(config: AppConfig): Services {
  const llmLimiter = createLimiter('llm', config.rateLimit.llm);
  const tavilyLimiter = createLimiter('tavily', config.rateLimit.search);
  const wikipediaLimiter = createLimiter('wikipedia', config.rateLimit.search);

  return {
    model: new OpenAILanguageModel({
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      timeoutMs: config.llm.timeoutMs,
      limiter: llmLimiter,
    }),
    webSearch: new TavilySearchProvider({
      apiKey: config.search.tavilyApiKey,
      limiter: tavilyLimiter,
      defaultTimeoutMs: config.search.timeoutMs,
    }),
    encyclopedia: new WikipediaSearchProvider({
      limiter: wikipediaLimiter,
      defaultTimeoutMs: config.search.timeoutMs,
    }),
    limiters: [llmLimiter, tavilyLimiter, wikipediaLimiter],
  };
}

/**
 * Wire the pipeline over the given services.
 */
export function createPipeline(
  config: AppConfig,
  services: Pick<Services, 'model' | 'webSearch' | 'encyclopedia'>
): FactCheckPipeline {
  return new FactCheckPipeline(
    {
      questions: new QuestionGenerator(services.model, { maxQuestions: config.pipeline.maxQuestions }),
      gatherer: new EvidenceGatherer(services.webSearch, services.encyclopedia, {
        webMaxResults: config.search.webMaxResults,
        encyclopediaMaxResults: config.search.encyclopediaMaxResults,
        timeoutMs: config.search.timeoutMs,
      }),
      verifier: new ClaimVerifier(services.model, {
        excerptChars: config.search.excerptChars,
        requestSourceEvaluation: config.verifier.requestSourceEvaluation,
      }),
    },
    {
      concurrency: config.pipeline.concurrency,
      thresholds: config.judge,
      confidencePrecedence: config.verifier.confidencePrecedence,
    }
  );
}

export function configureLogging(config: AppConfig): void {
  configureLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    environment: config.environment,
    serviceName: 'veracity-engine',
  });
}

export function bootstrap(config: AppConfig): Runtime {
  configureLogging(config);
  const services = createServices(config);
  return { ...services, pipeline: createPipeline(config, services) };
}
