/**
 * @fileoverview Performance metrics over the query log.
 */

import type { QueryLogEntry } from '../storage/query_log.js';
import { mean } from '../utils/math.js';

export interface PerformanceMetrics {
  /** Seconds */
  averageResponseTime: number;
  /** Mean answer confidence, used as a quality proxy */
  averageQualityScore: number;
  totalQueries: number;
  /** Completed / total */
  successRate: number;
  /** Share of queries answered with confidence above the threshold */
  retrievalAccuracy: number;
  /** Mean feedback rating (1-5) in the window; null without feedback */
  userSatisfaction: number | null;
  windowDays: number;
}

export interface PerformanceMetricOptions {
  windowDays?: number;
  /** Confidence above which a query counts as well retrieved */
  highConfidenceThreshold?: number;
  /** Mean feedback rating over the same window */
  averageRating?: number | null;
}

export const DEFAULT_METRICS_WINDOW_DAYS = 7;
export const HIGH_CONFIDENCE_THRESHOLD = 0.7;

/**
 * ISO cutoff for a window ending at `now`.
 */
export function windowStart(windowDays: number, now: Date = new Date()): string {
  return new Date(now.getTime() - windowDays * 24 * 60 * 60 * 1000).toISOString();
}

/**
 * Zero processing times and confidences count as missing, so a failed
 * query does not drag the averages down.
 */
export function computePerformanceMetrics(
  entries: readonly QueryLogEntry[],
  options: PerformanceMetricOptions = {},
): PerformanceMetrics {
  const windowDays = options.windowDays ?? DEFAULT_METRICS_WINDOW_DAYS;
  const threshold = options.highConfidenceThreshold ?? HIGH_CONFIDENCE_THRESHOLD;
  const total = entries.length;
  const userSatisfaction = options.averageRating ?? null;

  if (total === 0) {
    return {
      averageResponseTime: 0,
      averageQualityScore: 0,
      totalQueries: 0,
      successRate: 0,
      retrievalAccuracy: 0,
      userSatisfaction,
      windowDays,
    };
  }

  const responseTimes = entries.map((entry) => entry.processingTime).filter((time) => time > 0);
  const confidences = entries
    .map((entry) => entry.confidenceScore)
    .filter((score): score is number => score !== null && score > 0);
  const completed = entries.filter((entry) => entry.status === 'completed').length;
  const highConfidence = confidences.filter((score) => score > threshold).length;

  return {
    averageResponseTime: mean(responseTimes),
    averageQualityScore: mean(confidences),
    totalQueries: total,
    successRate: completed / total,
    retrievalAccuracy: highConfidence / total,
    userSatisfaction,
    windowDays,
  };
}
