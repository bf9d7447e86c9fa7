/**
 * @fileoverview Async helpers for provider calls and re-ranking.
 */

export interface WithTimeoutOptions {
  /** Appended to the error message, e.g. the request URL */
  context?: string;
  errorCode?: string;
}

export class TimeoutError extends Error {
  readonly code?: string;

  constructor(
    readonly timeoutMs: number,
    context?: string,
    errorCode?: string,
  ) {
    super(context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.code = errorCode;
  }
}

/**
 * Reject with TimeoutError when `promise` has not settled within
 * `timeoutMs`. A missing or non-positive timeout waits indefinitely. The
 * underlying work is not cancelled.
 *
 * @example
 * ```typescript
 * const reply = await withTimeout(model.complete(request), 30000, { context: 'chat completion' });
 * ```
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs?: number, options: WithTimeoutOptions = {}): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, options.context, options.errorCode)), timeoutMs);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Map over items with at most `concurrency` calls in flight.
 * Results keep the order of `items` regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const limit = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: limit }, () => worker()));
  return results;
}
