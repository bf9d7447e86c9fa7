/**
 * @fileoverview Security module exports
 *
 * @packageDocumentation
 */

export {
  type RateLimiterConfig,
  type RateLimitResult,
  DEFAULT_RATE_LIMITER_CONFIG,
  RateLimiter,
} from './rate_limiter.js';
