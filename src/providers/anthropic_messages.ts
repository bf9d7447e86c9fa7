/**
 * @fileoverview Anthropic Messages API client.
 *
 * Frequency and presence penalties have no counterpart in this API and are
 * dropped from the request.
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import { postJson, trimTrailingSlash, type FetchLike } from './http.js';
import type { CompletionRequest, LanguageModel } from './types.js';

export const ANTHROPIC_DEFAULT_BASE_URL = 'https://api.anthropic.com';
export const ANTHROPIC_API_VERSION = '2023-06-01';
const DEFAULT_MAX_TOKENS = 1024;

const MessagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
});

export interface AnthropicMessagesModelOptions {
  apiKey: string;
  defaultModel: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export class AnthropicMessagesModel implements LanguageModel {
  readonly provider = 'anthropic';
  readonly defaultModel: string;
  private readonly endpoint: string;

  constructor(private readonly options: AnthropicMessagesModelOptions) {
    this.defaultModel = options.defaultModel;
    this.endpoint = `${trimTrailingSlash(options.baseUrl ?? ANTHROPIC_DEFAULT_BASE_URL)}/v1/messages`;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const body = {
      model: request.model ?? this.defaultModel,
      system: request.system,
      messages: request.messages,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: request.temperature,
      top_p: request.topP,
    };

    const response = await postJson(this.endpoint, body, MessagesResponseSchema, {
      provider: this.provider,
      headers: {
        'x-api-key': this.options.apiKey,
        'anthropic-version': ANTHROPIC_API_VERSION,
      },
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    });

    const text = response.content
      .filter((block) => block.type === 'text' && block.text !== undefined)
      .map((block) => block.text)
      .join('');
    if (!text) {
      throw new ProviderError(this.provider, 'invalid_response', false, 'message has no text content');
    }
    return text;
  }
}
