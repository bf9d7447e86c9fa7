/**
 * @fileoverview Deterministic feature-vector embeddings.
 *
 * Offline stand-in for a real embedding model. Vectors are built from
 * surface features of the text, so identical inputs always embed
 * identically but nearness only loosely tracks meaning.
 *
 * Layout (384 dimensions):
 *   [0..15]  MD5 digest bytes scaled to [0, 1]
 *   [16]     min(length / 1000, 1)
 *   [17]     whitespace-separated word count / 100
 *   [18]     space characters / length
 *   [19..23] frequency of a, e, i, o, u in the lower-cased text
 *   rest     zero
 */

import { createHash } from 'node:crypto';
import type { EmbeddingProvider } from './types.js';

export const HASHED_EMBEDDING_DIMENSION = 384;
const VOWELS = ['a', 'e', 'i', 'o', 'u'] as const;

function countOccurrences(text: string, needle: string): number {
  let count = 0;
  let index = text.indexOf(needle);
  while (index !== -1) {
    count++;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
}

export function hashedEmbedding(text: string, dimensions = HASHED_EMBEDDING_DIMENSION): number[] {
  const digest = createHash('md5').update(text, 'utf8').digest();
  const hashFeatures = Array.from(digest, (byte) => byte / 255);

  const length = text.length;
  const safeLength = Math.max(length, 1);
  const words = text.split(/\s+/).filter(Boolean).length;
  const lengthFeatures = [
    Math.min(length / 1000, 1),
    words / 100,
    countOccurrences(text, ' ') / safeLength,
  ];

  const lower = text.toLowerCase();
  const vowelFeatures = VOWELS.map((vowel) => countOccurrences(lower, vowel) / safeLength);

  const features = [...hashFeatures, ...lengthFeatures, ...vowelFeatures].slice(0, dimensions);
  while (features.length < dimensions) features.push(0);
  return features;
}

export class HashedEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'hashed';

  constructor(readonly dimensions: number = HASHED_EMBEDDING_DIMENSION) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => hashedEmbedding(text, this.dimensions));
  }
}
