/**
 * @fileoverview A/B test creation, assignment, recording and analysis
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { InMemoryABTestStore, SqliteABTestStore, type ABTestStore } from '../../storage/ab_tests.js';
import { openDatabase } from '../../storage/database.js';
import {
  ABTestConfigSchema,
  ABTestingService,
  assignmentBucket,
  compareVariants,
  requiredSampleSize,
} from '../ab_testing.js';

/** 30 values alternating between `low` and `high` */
function alternating(low: number, high: number): number[] {
  return Array.from({ length: 30 }, (_, i) => (i % 2 === 0 ? low : high));
}

describe('requiredSampleSize', () => {
  it('follows the significance level', () => {
    // 2 * (1.959964 + 0.841621)^2 / 0.2^2 = 392.44
    expect(requiredSampleSize(0.05)).toBe(393);
    // 2 * (2.575829 + 0.841621)^2 / 0.2^2 = 583.95
    expect(requiredSampleSize(0.01)).toBe(584);
  });
});

describe('ABTestConfigSchema', () => {
  it('applies defaults', () => {
    expect(ABTestConfigSchema.parse({ testName: 'rerank-prompt' })).toEqual({
      testName: 'rerank-prompt',
      controlVersion: 'A',
      treatmentVersion: 'B',
      trafficSplit: 0.5,
      minimumSampleSize: 100,
      significanceLevel: 0.05,
    });
  });

  it('bounds the split, sample size and significance level', () => {
    expect(ABTestConfigSchema.safeParse({ testName: 't', trafficSplit: 0.95 }).success).toBe(false);
    expect(ABTestConfigSchema.safeParse({ testName: 't', minimumSampleSize: 29 }).success).toBe(false);
    expect(ABTestConfigSchema.safeParse({ testName: 't', significanceLevel: 0.2 }).success).toBe(false);
  });

  it('requires distinct versions', () => {
    const parsed = ABTestConfigSchema.safeParse({ testName: 't', controlVersion: 'v1', treatmentVersion: 'v1' });

    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(parsed.error.issues[0].path).toEqual(['treatmentVersion']);
  });
});

describe('compareVariants', () => {
  it('recommends a significantly better treatment', () => {
    // pooled sd = sqrt(30/29), t = 3.81, two-sided p = 1.4e-4
    const report = compareVariants(alternating(1, 3), alternating(2, 4), 0.05);

    expect(report).toMatchObject({
      status: 'complete',
      controlMean: 2,
      treatmentMean: 3,
      lift: 50,
      sampleSizes: { control: 30, treatment: 30 },
      recommendation: 'deploy',
    });
    expect(report.pValue).toBeCloseTo(0.00014, 5);
    expect(report.effectSize).toBeCloseTo(Math.sqrt(29 / 30), 10);
    expect(report.confidenceLevel).toBeCloseTo(0.95, 10);
  });

  it('does not deploy a significantly worse treatment', () => {
    const report = compareVariants(alternating(2, 4), alternating(1, 3), 0.05);

    expect(report.status).toBe('complete');
    expect(report.lift).toBeCloseTo(-100 / 3, 10);
    expect(report.recommendation).toBe('no_change');
  });

  it('is inconclusive for identical variants', () => {
    const report = compareVariants(alternating(1, 3), alternating(1, 3), 0.05);

    expect(report).toMatchObject({ status: 'inconclusive', lift: 0, effectSize: 0, recommendation: 'no_change' });
    expect(report.pValue).toBeCloseTo(1, 6);
  });

  it('handles constant outcomes and a zero control mean', () => {
    const report = compareVariants(new Array<number>(30).fill(0), new Array<number>(30).fill(1), 0.05);

    expect(report).toMatchObject({ status: 'complete', lift: null, pValue: 0, effectSize: null, recommendation: 'deploy' });
  });
});

describe('assignmentBucket', () => {
  it('hashes the test name and user id into 0-99', () => {
    expect(assignmentBucket('rerank-prompt', 'user-1')).toBe(3);
    expect(assignmentBucket('rerank-prompt', 'user-4')).toBe(93);
  });
});

describe.each([
  ['InMemoryABTestStore', 'memory'],
  ['SqliteABTestStore', 'sqlite'],
] as const)('ABTestingService over %s', (_name, kind) => {
  let db: Database.Database | undefined;
  let store: ABTestStore;
  let service: ABTestingService;

  beforeEach(() => {
    if (kind === 'sqlite') {
      db = openDatabase(':memory:');
      store = new SqliteABTestStore(db);
    } else {
      store = new InMemoryABTestStore();
    }
    service = new ABTestingService(store);
  });

  afterEach(() => {
    db?.close();
    db = undefined;
  });

  it('raises the minimum sample size to what the test needs', () => {
    const small = service.createTest(ABTestConfigSchema.parse({ testName: 'small' }));
    const large = service.createTest(ABTestConfigSchema.parse({ testName: 'large', minimumSampleSize: 500 }));

    expect(small.minimumSampleSize).toBe(393);
    expect(large.minimumSampleSize).toBe(500);
    expect(service.listTests().map((test) => test.name)).toEqual(['large', 'small']);
  });

  it('assigns users by hash bucket against the split', () => {
    service.createTest(ABTestConfigSchema.parse({ testName: 'rerank-prompt' }));

    expect(service.assignVariant('rerank-prompt', 'user-1')).toBe('B');
    expect(service.assignVariant('rerank-prompt', 'user-4')).toBe('A');
    expect(service.assignVariant('rerank-prompt', 'user-4')).toBe('A');
  });

  it('sends everyone to the control of an unknown test', () => {
    expect(service.assignVariant('missing', 'user-1')).toBe('A');
  });

  it('rejects results for unknown tests and variants', () => {
    service.createTest(ABTestConfigSchema.parse({ testName: 't' }));

    const unknownTest = service.recordResult('missing', 'A', 'user-1', 1);
    const unknownVariant = service.recordResult('t', 'C', 'user-1', 1);
    const badOutcome = service.recordResult('t', 'A', 'user-1', Number.NaN);

    expect(unknownTest.ok).toBe(false);
    if (!unknownTest.ok) expect(unknownTest.error).toBeInstanceOf(NotFoundError);
    expect(unknownVariant.ok).toBe(false);
    if (!unknownVariant.ok) expect(unknownVariant.error).toMatchObject({ field: 'variant' });
    expect(badOutcome.ok).toBe(false);
    if (!badOutcome.ok) expect(badOutcome.error).toBeInstanceOf(ValidationError);
  });

  it('needs 30 outcomes per variant before analysing', () => {
    service.createTest(ABTestConfigSchema.parse({ testName: 't' }));
    for (const [i, outcome] of alternating(1, 3).entries()) {
      service.recordResult('t', 'A', `control-${i}`, outcome);
    }
    service.recordResult('t', 'B', 'treatment-0', 2);

    expect(service.analyzeTest('t')).toEqual({
      ok: true,
      value: {
        status: 'insufficient_data',
        message: 'Need at least 30 samples per variant',
        sampleSizes: { control: 30, treatment: 1 },
      },
    });
  });

  it('analyses recorded outcomes', () => {
    service.createTest(ABTestConfigSchema.parse({ testName: 't' }));
    for (const [i, outcome] of alternating(1, 3).entries()) service.recordResult('t', 'A', `control-${i}`, outcome);
    for (const [i, outcome] of alternating(2, 4).entries()) service.recordResult('t', 'B', `treatment-${i}`, outcome);

    const analysis = service.analyzeTest('t');

    expect(analysis).toMatchObject({ ok: true, value: { status: 'complete', lift: 50, recommendation: 'deploy' } });
  });

  it('drops earlier outcomes when a test is created again', () => {
    service.createTest(ABTestConfigSchema.parse({ testName: 't' }));
    service.recordResult('t', 'A', 'user-1', 1);
    service.createTest(ABTestConfigSchema.parse({ testName: 't' }));

    expect(store.outcomes('t')).toEqual([]);
  });

  it('reports an unknown test as not found', () => {
    const analysis = service.analyzeTest('missing');

    expect(analysis.ok).toBe(false);
    if (analysis.ok) return;
    expect(analysis.error).toMatchObject({ resource: 'ab_test', id: 'missing' });
  });
});
