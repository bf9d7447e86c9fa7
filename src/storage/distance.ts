import type { DistanceMetric } from '../config/rag_config.js';
import { cosineDistance, dotProduct, euclideanDistance } from '../utils/math.js';

export type DistanceFn = (a: ArrayLike<number>, b: ArrayLike<number>) => number;

/**
 * Distance used by the in-process indexes. Smaller is closer for every
 * metric; inner product is negated so it sorts the same way.
 */
export function distanceFunction(metric: DistanceMetric): DistanceFn {
  switch (metric) {
    case 'cosine':
      return cosineDistance;
    case 'l2':
      return euclideanDistance;
    case 'inner_product':
      return (a, b) => -dotProduct(a, b);
  }
}
