/**
 * @fileoverview Rate Limiter
 *
 * Sliding-window limiter keyed by client id. The service checks it before
 * running a query.
 *
 * @packageDocumentation
 */

import { RateLimitError } from '../core/errors.js';

// ============================================================================
// TYPES
// ============================================================================

/** Rate limiter configuration */
export interface RateLimiterConfig {
  /** Maximum requests per window */
  maxRequests: number;

  /** Window duration in milliseconds */
  windowMs: number;

  /** Skip rate limiting for these keys */
  skipKeys?: ReadonlySet<string>;

  /** Clock, overridable in tests */
  now?: () => number;
}

/** Rate limit result */
export interface RateLimitResult {
  /** Whether request is allowed */
  allowed: boolean;

  /** Remaining requests in window */
  remaining: number;

  /** Time until the oldest request leaves the window (ms) */
  resetMs: number;

  /** Current request count */
  count: number;

  /** Limit that was applied */
  limit: number;

  /** Retry-After value (seconds), set when refused */
  retryAfter?: number;
}

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  maxRequests: 60,
  windowMs: 60000, // 1 minute
};

// ============================================================================
// RATE LIMITER
// ============================================================================

export class RateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly now: () => number;
  private readonly entries = new Map<string, number[]>();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = { ...DEFAULT_RATE_LIMITER_CONFIG, ...config };
    this.now = this.config.now ?? Date.now;

    this.cleanupInterval = setInterval(() => this.cleanup(), this.config.windowMs);
    // Never keep the process alive just for cleanup.
    this.cleanupInterval.unref();
  }

  private recent(key: string, now: number): number[] {
    const windowStart = now - this.config.windowMs;
    const timestamps = (this.entries.get(key) ?? []).filter((t) => t > windowStart);
    this.entries.set(key, timestamps);
    return timestamps;
  }

  /**
   * Record a request for `key` if the window has room.
   */
  check(key: string): RateLimitResult {
    const limit = this.config.maxRequests;
    if (this.config.skipKeys?.has(key)) {
      return { allowed: true, remaining: limit, resetMs: 0, count: 0, limit };
    }

    const now = this.now();
    const timestamps = this.recent(key, now);
    const allowed = timestamps.length < limit;
    if (allowed) {
      timestamps.push(now);
    }

    const resetMs = timestamps.length > 0
      ? Math.max(0, timestamps[0] + this.config.windowMs - now)
      : this.config.windowMs;

    return {
      allowed,
      remaining: Math.max(0, limit - timestamps.length),
      resetMs,
      count: timestamps.length,
      limit,
      retryAfter: allowed ? undefined : Math.ceil(resetMs / 1000),
    };
  }

  /**
   * Like check(), but throws RateLimitError when the request is refused.
   */
  enforce(key: string): RateLimitResult {
    const result = this.check(key);
    if (!result.allowed) {
      throw new RateLimitError(key, result.retryAfter ?? Math.ceil(this.config.windowMs / 1000));
    }
    return result;
  }

  /**
   * Reset rate limit for a key.
   */
  reset(key: string): void {
    this.entries.delete(key);
  }

  /**
   * Clean up keys with no requests in the current window.
   */
  private cleanup(): void {
    const now = this.now();
    for (const key of [...this.entries.keys()]) {
      if (this.recent(key, now).length === 0) {
        this.entries.delete(key);
      }
    }
  }

  /** Number of keys with tracked requests */
  get trackedKeys(): number {
    return this.entries.size;
  }

  /**
   * Stop the cleanup timer and forget all keys.
   */
  dispose(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.entries.clear();
  }
}
