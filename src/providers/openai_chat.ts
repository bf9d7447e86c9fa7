/**
 * @fileoverview OpenAI-compatible chat completions client.
 *
 * Works against any endpoint implementing `POST {baseUrl}/chat/completions`.
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import { postJson, trimTrailingSlash, type FetchLike } from './http.js';
import type { CompletionRequest, LanguageModel } from './types.js';

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export interface OpenAIChatModelOptions {
  apiKey: string;
  defaultModel: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export class OpenAIChatModel implements LanguageModel {
  readonly provider = 'openai';
  readonly defaultModel: string;
  private readonly endpoint: string;

  constructor(private readonly options: OpenAIChatModelOptions) {
    this.defaultModel = options.defaultModel;
    this.endpoint = `${trimTrailingSlash(options.baseUrl ?? OPENAI_DEFAULT_BASE_URL)}/chat/completions`;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const body = {
      model: request.model ?? this.defaultModel,
      messages: [{ role: 'system', content: request.system }, ...request.messages],
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      top_p: request.topP,
      frequency_penalty: request.frequencyPenalty,
      presence_penalty: request.presencePenalty,
    };

    const response = await postJson(this.endpoint, body, ChatCompletionSchema, {
      provider: this.provider,
      headers: { authorization: `Bearer ${this.options.apiKey}` },
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    });

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new ProviderError(this.provider, 'invalid_response', false, 'completion has no content');
    }
    return content;
  }
}
