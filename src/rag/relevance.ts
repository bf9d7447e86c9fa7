import type { DistanceMetric } from '../config/rag_config.js';
import { clamp01 } from '../utils/math.js';

/** Maps an index distance to a relevance score in [0, 1]. */
export type RelevancePolicy = (distance: number) => number;

/**
 * Cosine distance lies in [0, 2]; anything past 1 means no relevance.
 */
export const cosineRelevance: RelevancePolicy = (distance) => clamp01(Math.max(0, 1 - distance));

export const l2Relevance: RelevancePolicy = (distance) => clamp01(1 / (1 + Math.max(0, distance)));

/**
 * The index reports inner product as its negation so smaller sorts closer.
 */
export const innerProductRelevance: RelevancePolicy = (distance) => clamp01((1 - distance) / 2);

export function relevancePolicyFor(metric: DistanceMetric): RelevancePolicy {
  switch (metric) {
    case 'cosine':
      return cosineRelevance;
    case 'l2':
      return l2Relevance;
    case 'inner_product':
      return innerProductRelevance;
  }
}
