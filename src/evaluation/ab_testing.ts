/**
 * @fileoverview A/B testing
 *
 * Splits users between a control and a treatment version, records a numeric
 * outcome per user and compares the two means with a two-sample t statistic.
 * With at least 30 samples per variant the p-value uses the normal
 * approximation of the t distribution.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { ABTestDefinition, ABTestOutcome, ABTestStore } from '../storage/ab_tests.js';
import { logDebug, logInfo } from '../telemetry/logger.js';
import { inverseNormalCdf, mean, normalCdf, sampleVariance } from '../utils/math.js';

// ============================================================================
// CONFIG
// ============================================================================

export const MIN_SAMPLES_PER_VARIANT = 30;
export const MINIMUM_DETECTABLE_EFFECT = 0.2;
export const STATISTICAL_POWER = 0.8;
export const DEFAULT_CONTROL_VERSION = 'A';

export const ABTestConfigSchema = z
  .object({
    testName: z.string().trim().min(1).max(100),
    controlVersion: z.string().min(1).default(DEFAULT_CONTROL_VERSION),
    treatmentVersion: z.string().min(1).default('B'),
    trafficSplit: z.number().min(0.1).max(0.9).default(0.5),
    minimumSampleSize: z.number().int().min(MIN_SAMPLES_PER_VARIANT).default(100),
    significanceLevel: z.number().min(0.01).max(0.1).default(0.05),
  })
  .refine((config) => config.controlVersion !== config.treatmentVersion, {
    message: 'Treatment version must differ from the control version',
    path: ['treatmentVersion'],
  });

export type ABTestConfigInput = z.input<typeof ABTestConfigSchema>;
export type ABTestConfig = z.output<typeof ABTestConfigSchema>;

// ============================================================================
// RESULT TYPES
// ============================================================================

export interface VariantSampleSizes {
  control: number;
  treatment: number;
}

export interface InsufficientDataAnalysis {
  status: 'insufficient_data';
  message: string;
  sampleSizes: VariantSampleSizes;
}

export interface ABTestReport {
  /** complete when p < significance level */
  status: 'complete' | 'inconclusive';
  controlMean: number;
  treatmentMean: number;
  /** Percent change of the treatment mean over the control mean; null when the control mean is 0 */
  lift: number | null;
  pValue: number;
  /** Cohen's d over the pooled standard deviation; null when both variants are constant */
  effectSize: number | null;
  confidenceLevel: number;
  sampleSizes: VariantSampleSizes;
  recommendation: 'deploy' | 'no_change';
}

export type ABTestAnalysis = InsufficientDataAnalysis | ABTestReport;

// ============================================================================
// STATISTICS
// ============================================================================

/**
 * Per-variant sample size for a two-sided test at `alpha` detecting a
 * standardized effect of `effectSize` with the given power.
 */
export function requiredSampleSize(
  alpha: number,
  effectSize = MINIMUM_DETECTABLE_EFFECT,
  power = STATISTICAL_POWER,
): number {
  const zAlpha = inverseNormalCdf(1 - alpha / 2);
  const zBeta = inverseNormalCdf(power);
  return Math.ceil((2 * (zAlpha + zBeta) ** 2) / effectSize ** 2);
}

/**
 * Stable bucket in [0, 100) for a user within a test.
 */
export function assignmentBucket(testName: string, userId: string): number {
  return createHash('md5').update(`${testName}_${userId}`).digest().readUInt32BE(0) % 100;
}

/**
 * Pooled-variance two-sample comparison of treatment against control.
 */
export function compareVariants(
  control: readonly number[],
  treatment: readonly number[],
  significanceLevel: number,
): ABTestReport {
  const controlMean = mean(control);
  const treatmentMean = mean(treatment);
  const difference = treatmentMean - controlMean;

  const pooledVariance =
    ((control.length - 1) * sampleVariance(control) + (treatment.length - 1) * sampleVariance(treatment)) /
    (control.length + treatment.length - 2);
  const pooledStd = Math.sqrt(pooledVariance);

  let pValue: number;
  let effectSize: number | null;
  if (pooledStd === 0) {
    pValue = difference === 0 ? 1 : 0;
    effectSize = null;
  } else {
    const t = difference / (pooledStd * Math.sqrt(1 / control.length + 1 / treatment.length));
    pValue = 2 * (1 - normalCdf(Math.abs(t)));
    effectSize = difference / pooledStd;
  }

  const significant = pValue < significanceLevel;
  return {
    status: significant ? 'complete' : 'inconclusive',
    controlMean,
    treatmentMean,
    lift: controlMean === 0 ? null : (difference / controlMean) * 100,
    pValue,
    effectSize,
    confidenceLevel: 1 - significanceLevel,
    sampleSizes: { control: control.length, treatment: treatment.length },
    recommendation: significant && treatmentMean > controlMean ? 'deploy' : 'no_change',
  };
}

// ============================================================================
// SERVICE
// ============================================================================

export class ABTestingService {
  constructor(private readonly store: ABTestStore) {}

  /**
   * Create or restart a test. The stored minimum sample size is raised to
   * what the significance level requires.
   */
  createTest(config: ABTestConfig): ABTestDefinition {
    const required = requiredSampleSize(config.significanceLevel);
    const test: ABTestDefinition = {
      name: config.testName,
      controlVersion: config.controlVersion,
      treatmentVersion: config.treatmentVersion,
      trafficSplit: config.trafficSplit,
      minimumSampleSize: Math.max(config.minimumSampleSize, required),
      significanceLevel: config.significanceLevel,
      createdAt: new Date().toISOString(),
    };
    this.store.saveTest(test);
    logInfo(`Created A/B test '${test.name}' requiring ${required} samples per variant`, {
      trafficSplit: test.trafficSplit,
    });
    return test;
  }

  getTest(name: string): ABTestDefinition | undefined {
    return this.store.getTest(name);
  }

  listTests(): ABTestDefinition[] {
    return this.store.listTests();
  }

  /**
   * Same user, same test, same variant. Unknown tests send everyone to the
   * control.
   */
  assignVariant(testName: string, userId: string): string {
    const test = this.store.getTest(testName);
    if (!test) {
      logDebug(`Unknown A/B test '${testName}', assigning control`);
      return DEFAULT_CONTROL_VERSION;
    }
    return assignmentBucket(testName, userId) < test.trafficSplit * 100 ? test.treatmentVersion : test.controlVersion;
  }

  recordResult(
    testName: string,
    variant: string,
    userId: string,
    outcome: number,
  ): Result<ABTestOutcome, NotFoundError | ValidationError> {
    const test = this.store.getTest(testName);
    if (!test) return Err(new NotFoundError('ab_test', testName));
    if (variant !== test.controlVersion && variant !== test.treatmentVersion) {
      return Err(new ValidationError('variant', `"${test.controlVersion}" or "${test.treatmentVersion}"`, JSON.stringify(variant)));
    }
    if (!Number.isFinite(outcome)) {
      return Err(new ValidationError('outcome', 'finite number', String(outcome)));
    }

    const recorded: ABTestOutcome = { testName, variant, userId, outcome, recordedAt: new Date().toISOString() };
    this.store.recordOutcome(recorded);
    return Ok(recorded);
  }

  analyzeTest(testName: string): Result<ABTestAnalysis, NotFoundError> {
    const test = this.store.getTest(testName);
    if (!test) return Err(new NotFoundError('ab_test', testName));

    const outcomes = this.store.outcomes(testName);
    const control = outcomes.filter((entry) => entry.variant === test.controlVersion).map((entry) => entry.outcome);
    const treatment = outcomes.filter((entry) => entry.variant === test.treatmentVersion).map((entry) => entry.outcome);

    if (control.length < MIN_SAMPLES_PER_VARIANT || treatment.length < MIN_SAMPLES_PER_VARIANT) {
      return Ok({
        status: 'insufficient_data',
        message: `Need at least ${MIN_SAMPLES_PER_VARIANT} samples per variant`,
        sampleSizes: { control: control.length, treatment: treatment.length },
      });
    }
    return Ok(compareVariants(control, treatment, test.significanceLevel));
  }
}
