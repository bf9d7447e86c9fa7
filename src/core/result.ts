/**
 * @fileoverview Result type for explicit error handling
 *
 * Pipeline entry points return Result<T, E> instead of throwing so callers
 * branch on `ok` rather than wrapping every call in try/catch.
 */

import { toError } from '../utils/errors.js';

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Run `fn` and capture a rejection as an Err.
 */
export async function safeAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (error) {
    return Err(toError(error));
  }
}

/**
 * Value of an Ok; throws the error of an Err.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

// ============================================================================
// RETRY
// ============================================================================

export interface RetryOptions {
  /** Counts the first call; defaults to 3 */
  maxAttempts?: number;
  /** Pause before the second attempt; defaults to 1000 */
  delayMs?: number;
  /** Applied to the pause after each failure; defaults to 2 */
  backoffMultiplier?: number;
  /** Return false to stop retrying and surface this error */
  shouldRetry?: (error: Error) => boolean;
  /** Called before each pause, with the attempt that just failed */
  onRetry?: (error: Error, attempt: number) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Call `fn` until it resolves or the attempts run out. Never throws: the
 * last failure comes back as an Err.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<Result<T, Error>> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const multiplier = options.backoffMultiplier ?? 2;
  const shouldRetry = options.shouldRetry ?? (() => true);
  let delay = options.delayMs ?? 1000;

  for (let attempt = 1; ; attempt++) {
    const result = await safeAsync(() => fn(attempt));
    if (result.ok || attempt >= maxAttempts || !shouldRetry(result.error)) {
      return result;
    }
    options.onRetry?.(result.error, attempt);
    if (delay > 0) {
      await sleep(delay);
    }
    delay *= multiplier;
  }
}
