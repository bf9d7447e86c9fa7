/**
 * @fileoverview JSON-over-HTTP transport shared by the hosted providers.
 *
 * Maps transport outcomes onto ProviderError reasons:
 *   401/403 → auth_failed (not retryable)
 *   429     → rate_limit
 *   5xx     → unavailable
 *   other non-2xx → invalid_response (not retryable)
 *   fetch rejection → network_error, TimeoutError → timeout
 */

import type { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import { TimeoutError, withTimeout } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface PostJsonOptions {
  provider: string;
  headers: Record<string, string>;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const MAX_ERROR_BODY = 300;

function classifyStatus(provider: string, status: number, body: string): ProviderError {
  const detail = `HTTP ${status}${body ? `: ${body.slice(0, MAX_ERROR_BODY)}` : ''}`;
  if (status === 401 || status === 403) {
    return new ProviderError(provider, 'auth_failed', false, detail, status);
  }
  if (status === 429) {
    return new ProviderError(provider, 'rate_limit', true, detail, status);
  }
  if (status >= 500) {
    return new ProviderError(provider, 'unavailable', true, detail, status);
  }
  return new ProviderError(provider, 'invalid_response', false, detail, status);
}

interface RawReply {
  ok: boolean;
  status: number;
  text: string;
}

export async function postJson<T>(
  url: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: PostJsonOptions,
): Promise<T> {
  const fetchImpl = options.fetchImpl ?? fetch;
  // The timeout covers the body as well as the headers.
  const exchange = async (): Promise<RawReply> => {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...options.headers },
      body: JSON.stringify(body),
    });
    return { ok: response.ok, status: response.status, text: await response.text() };
  };

  let reply: RawReply;
  try {
    reply = await withTimeout(exchange(), options.timeoutMs, {
      context: `${options.provider} ${url}`,
      errorCode: 'ETIMEDOUT',
    });
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new ProviderError(options.provider, 'timeout', true, error.message);
    }
    throw new ProviderError(options.provider, 'network_error', true, getErrorMessage(error));
  }

  if (!reply.ok) {
    throw classifyStatus(options.provider, reply.status, reply.text);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(reply.text);
  } catch (error) {
    throw new ProviderError(options.provider, 'invalid_response', false, `body is not JSON: ${getErrorMessage(error)}`);
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ProviderError(
      options.provider,
      'invalid_response',
      false,
      `unexpected response shape at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`,
    );
  }
  return parsed.data;
}

export function trimTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}
