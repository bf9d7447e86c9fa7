/**
 * @fileoverview Provider Module Exports
 *
 * Language-model and embedding clients plus the factories that build them
 * from service configuration. A missing language model is a supported
 * degraded mode: the pipeline skips re-ranking and answers from a preview.
 *
 * @packageDocumentation
 */

import type { EmbeddingConfig, LlmConfig } from '../config/service_config.js';
import { ConfigurationError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { AnthropicMessagesModel } from './anthropic_messages.js';
import { HashedEmbeddingProvider } from './hashed_embeddings.js';
import type { FetchLike } from './http.js';
import { OpenAIChatModel } from './openai_chat.js';
import { OpenAIEmbeddingProvider } from './openai_embeddings.js';
import type { EmbeddingProvider, LanguageModel } from './types.js';

export type { ChatRole, ChatMessage, CompletionRequest, LanguageModel, EmbeddingProvider } from './types.js';
export { OpenAIChatModel, OPENAI_DEFAULT_BASE_URL, type OpenAIChatModelOptions } from './openai_chat.js';
export {
  AnthropicMessagesModel,
  ANTHROPIC_DEFAULT_BASE_URL,
  ANTHROPIC_API_VERSION,
  type AnthropicMessagesModelOptions,
} from './anthropic_messages.js';
export {
  OpenAIEmbeddingProvider,
  KNOWN_EMBEDDING_DIMENSIONS,
  type OpenAIEmbeddingProviderOptions,
} from './openai_embeddings.js';
export { HashedEmbeddingProvider, hashedEmbedding, HASHED_EMBEDDING_DIMENSION } from './hashed_embeddings.js';
export { postJson, type FetchLike, type PostJsonOptions } from './http.js';

// ============================================================================
// FACTORIES
// ============================================================================

/**
 * Build the configured language model, or null when none is configured.
 * `defaultModel` is the generation model from the RAG settings.
 */
export function createLanguageModel(
  config: LlmConfig,
  defaultModel: string,
  fetchImpl?: FetchLike,
): LanguageModel | null {
  if (config.provider === 'none') {
    return null;
  }
  if (!config.apiKey) {
    logWarning(`No API key for ${config.provider}; answers fall back to context previews`);
    return null;
  }

  const options = {
    apiKey: config.apiKey,
    defaultModel,
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    fetchImpl,
  };
  return config.provider === 'anthropic' ? new AnthropicMessagesModel(options) : new OpenAIChatModel(options);
}

export function createEmbeddingProvider(config: EmbeddingConfig, fetchImpl?: FetchLike): EmbeddingProvider {
  if (config.provider === 'hashed') {
    return new HashedEmbeddingProvider(config.dimensions);
  }
  if (!config.apiKey) {
    throw new ConfigurationError('embedding.apiKey', 'required when embedding.provider is openai');
  }
  return new OpenAIEmbeddingProvider({
    apiKey: config.apiKey,
    model: config.model,
    dimensions: config.dimensions,
    baseUrl: config.baseUrl,
    timeoutMs: config.requestTimeoutMs,
    fetchImpl,
  });
}
