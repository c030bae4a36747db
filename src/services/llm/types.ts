// ═══════════════════════════════════════════════════════════════════════════════
// LANGUAGE MODEL TYPES — Text Completion Oracle
// ═══════════════════════════════════════════════════════════════════════════════

export interface CompletionOptions {
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly timeoutMs?: number;
  /** Prepended as a system message */
  readonly system?: string;
}

/**
 * Opaque prompt-in, text-out oracle. `complete` rejects on any failure,
 * including an empty completion.
 */
export interface LanguageModel {
  readonly name: string;
  isAvailable(): boolean;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export class LanguageModelError extends Error {
  readonly name = 'LanguageModelError';
  readonly code = 'PROVIDER_ERROR';
  readonly model: string;

  constructor(model: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.model = model;
  }
}
