/**
 * @fileoverview Performance metrics over query-log entries
 */

import { describe, it, expect } from 'vitest';
import type { QueryLogEntry } from '../../storage/query_log.js';
import { computePerformanceMetrics, windowStart } from '../metrics.js';

let nextId = 0;

function entry(overrides: Partial<QueryLogEntry>): QueryLogEntry {
  nextId += 1;
  return {
    id: `q${nextId}`,
    createdAt: '2026-03-01T12:00:00.000Z',
    clientId: 'client-a',
    queryText: 'question',
    responseText: 'answer',
    confidenceScore: 0.5,
    processingTime: 1,
    sourcesCount: 2,
    status: 'completed',
    maxResults: 5,
    ...overrides,
  };
}

describe('computePerformanceMetrics', () => {
  it('returns zeros for an empty window', () => {
    expect(computePerformanceMetrics([], { windowDays: 3 })).toEqual({
      averageResponseTime: 0,
      averageQualityScore: 0,
      totalQueries: 0,
      successRate: 0,
      retrievalAccuracy: 0,
      userSatisfaction: null,
      windowDays: 3,
    });
  });

  it('reports the mean feedback rating as user satisfaction', () => {
    expect(computePerformanceMetrics([entry({})], { averageRating: 4.5 }).userSatisfaction).toBe(4.5);
    expect(computePerformanceMetrics([], { averageRating: 3 }).userSatisfaction).toBe(3);
  });

  it('ignores zero times and missing confidences in the averages', () => {
    const metrics = computePerformanceMetrics([
      entry({ processingTime: 2, confidenceScore: 0.9 }),
      entry({ processingTime: 0, confidenceScore: null, status: 'failed' }),
      entry({ processingTime: 4, confidenceScore: 0.5 }),
    ]);

    expect(metrics.averageResponseTime).toBe(3);
    expect(metrics.averageQualityScore).toBeCloseTo(0.7, 10);
    expect(metrics.totalQueries).toBe(3);
    expect(metrics.successRate).toBeCloseTo(2 / 3, 10);
    expect(metrics.windowDays).toBe(7);
  });

  it('counts confidence strictly above the threshold as accurate retrieval', () => {
    const metrics = computePerformanceMetrics([
      entry({ confidenceScore: 0.7 }),
      entry({ confidenceScore: 0.71 }),
      entry({ confidenceScore: 0.95 }),
      entry({ confidenceScore: 0.2 }),
    ]);

    expect(metrics.retrievalAccuracy).toBe(0.5);
  });

  it('accepts a custom threshold', () => {
    const metrics = computePerformanceMetrics([entry({ confidenceScore: 0.6 }), entry({ confidenceScore: 0.3 })], {
      highConfidenceThreshold: 0.5,
    });

    expect(metrics.retrievalAccuracy).toBe(0.5);
  });
});

describe('windowStart', () => {
  it('subtracts whole days from now', () => {
    expect(windowStart(7, new Date('2026-03-08T00:00:00.000Z'))).toBe('2026-03-01T00:00:00.000Z');
  });
});
