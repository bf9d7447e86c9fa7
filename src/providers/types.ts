/**
 * @fileoverview Provider contracts
 *
 * The pipeline depends only on these two interfaces:
 * - EmbeddingProvider: text → fixed-length vectors, deterministic per input
 * - LanguageModel: system prompt + messages → completion text
 *
 * Neither contract retries; callers decide what a failure means.
 *
 * @packageDocumentation
 */

// ============================================================================
// LANGUAGE MODEL
// ============================================================================

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Completion request parameters
 */
export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
  /** Overrides the client's default model */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  /** Ignored by providers without the setting */
  frequencyPenalty?: number;
  /** Ignored by providers without the setting */
  presencePenalty?: number;
}

export interface LanguageModel {
  /** Provider name for logs, e.g. "openai" */
  readonly provider: string;
  readonly defaultModel: string;

  /**
   * Complete a chat request.
   * @throws ProviderError on transport, auth or response-shape failures
   */
  complete(request: CompletionRequest): Promise<string>;
}

// ============================================================================
// EMBEDDING PROVIDER
// ============================================================================

export interface EmbeddingProvider {
  readonly id: string;
  readonly dimensions: number;

  /** One vector per input text, in input order */
  embed(texts: readonly string[]): Promise<number[][]>;
}
