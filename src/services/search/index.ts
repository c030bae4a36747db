// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH MODULE — Web and Encyclopedia Providers, Source Reliability
// ═══════════════════════════════════════════════════════════════════════════════

export * from './types.js';
export {
  TavilySearchProvider,
  TAVILY_ENDPOINT,
  type TavilySearchProviderOptions,
} from './tavily.js';
export {
  WikipediaSearchProvider,
  cleanSnippet,
  articleUrl,
  type WikipediaSearchProviderOptions,
} from './wikipedia.js';
export {
  ReliabilityTierSchema,
  getReliabilityTable,
  getReliabilityTier,
  isTrustedSource,
  isQuestionableSource,
  sourceDomain,
  type ReliabilityTier,
  type ReliabilityTable,
} from './reliability.js';
