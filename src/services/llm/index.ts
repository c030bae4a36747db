// ═══════════════════════════════════════════════════════════════════════════════
// LLM MODULE INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export {
  LanguageModelError,
  type LanguageModel,
  type CompletionOptions,
} from './types.js';

export {
  OpenAILanguageModel,
  type OpenAILanguageModelOptions,
  type ChatCompletionClient,
  type ChatCompletionRequest,
  type ChatCompletionReply,
  type ChatMessage,
} from './openai.js';
