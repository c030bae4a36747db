// ═══════════════════════════════════════════════════════════════════════════════
// OPENAI LANGUAGE MODEL — Chat Completions as a Text Oracle
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';
import { unlimited, type CallLimiter } from '../../infrastructure/rate-limit/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { LanguageModelError, type CompletionOptions, type LanguageModel } from './types.js';

const logger = getLogger({ component: 'llm' });

// ─────────────────────────────────────────────────────────────────────────────────
// CLIENT SHAPE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
}

export interface ChatCompletionReply {
  readonly choices: ReadonlyArray<{
    readonly message: { readonly content: string | null };
  }>;
}

/**
 * The part of the OpenAI SDK this model uses. The SDK client satisfies it;
 * tests pass a fake.
 */
export interface ChatCompletionClient {
  readonly chat: {
    readonly completions: {
      create(body: ChatCompletionRequest, options?: { signal?: AbortSignal }): Promise<ChatCompletionReply>;
    };
  };
}

export interface OpenAILanguageModelOptions {
  readonly apiKey?: string;
  readonly model?: string;
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly timeoutMs?: number;
  readonly limiter?: CallLimiter;
  /** Overrides the SDK client built from apiKey */
  readonly client?: ChatCompletionClient;
}

// ─────────────────────────────────────────────────────────────────────────────────
// MODEL
// ─────────────────────────────────────────────────────────────────────────────────

export class OpenAILanguageModel implements LanguageModel {
  readonly name: string;

  private readonly client: ChatCompletionClient | null;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly limiter: CallLimiter;

  constructor(options: OpenAILanguageModelOptions = {}) {
    this.model = options.model ?? 'gpt-4o-mini';
    this.name = `openai:${this.model}`;
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 1500;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.limiter = options.limiter ?? unlimited;

    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      // Retries are the limiter's job
      this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
    } else {
      this.client = null;
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const client = this.client;
    if (!client) {
      throw new LanguageModelError(this.model, 'OpenAI API key not configured');
    }

    const messages: ChatMessage[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    const request: ChatCompletionRequest = {
      model: this.model,
      messages,
      max_tokens: options.maxTokens ?? this.maxTokens,
      temperature: options.temperature ?? this.temperature,
    };

    const startTime = Date.now();
    const reply = await this.limiter.callWithBackoff(() =>
      this.send(client, request, options.timeoutMs ?? this.timeoutMs)
    );

    const content = reply.choices[0]?.message.content?.trim() ?? '';
    if (!content) {
      throw new LanguageModelError(this.model, 'Empty completion from language model');
    }

    logger.debug('Completion received', {
      model: this.model,
      promptChars: prompt.length,
      replyChars: content.length,
      latencyMs: Date.now() - startTime,
    });

    return content;
  }

  private async send(
    client: ChatCompletionClient,
    request: ChatCompletionRequest,
    timeoutMs: number
  ): Promise<ChatCompletionReply> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await client.chat.completions.create(request, { signal: controller.signal });
    } finally {
      clearTimeout(timer);
    }
  }
}
