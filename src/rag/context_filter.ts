/**
 * @fileoverview Context filter and diversifier
 *
 * Three passes over the retrieved chunks, each keeping input order:
 * quality (drop fragments and log noise), caller filters (`file_type`,
 * `min_score`), then diversity (drop near-duplicates of a kept chunk).
 */

import type { ContextChunk, FilterParams } from '../types.js';

export const MIN_CONTENT_LENGTH = 10;
export const NOISE_PREFIXES = ['error', 'warning', 'debug'] as const;
/** Word-set Jaccard above which a chunk counts as a duplicate */
export const DIVERSITY_THRESHOLD = 0.7;

export function passesQualityFilter(chunk: ContextChunk): boolean {
  if (chunk.content.trim().length < MIN_CONTENT_LENGTH) return false;
  const lowered = chunk.content.toLowerCase();
  return !NOISE_PREFIXES.some((prefix) => lowered.startsWith(prefix));
}

export function applyUserFilters(chunks: readonly ContextChunk[], params?: FilterParams): ContextChunk[] {
  let kept = [...chunks];
  if (params?.file_type !== undefined) {
    const fileType = params.file_type;
    kept = kept.filter((chunk) => chunk.metadata.file_type === fileType);
  }
  if (params?.min_score !== undefined) {
    const minScore = params.min_score;
    kept = kept.filter((chunk) => chunk.relevanceScore >= minScore);
  }
  return kept;
}

function wordSet(content: string): Set<string> {
  return new Set(content.toLowerCase().split(/\s+/).filter((word) => word.length > 0));
}

/**
 * Jaccard overlap of two word sets; 0 when either is empty.
 */
export function wordOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const word of a) {
    if (b.has(word)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function ensureDiversity(chunks: readonly ContextChunk[]): ContextChunk[] {
  if (chunks.length <= 1) return [...chunks];

  const kept: ContextChunk[] = [chunks[0]];
  const keptWords: Set<string>[] = [wordSet(chunks[0].content)];

  for (const chunk of chunks.slice(1)) {
    const words = wordSet(chunk.content);
    if (keptWords.some((existing) => wordOverlap(words, existing) > DIVERSITY_THRESHOLD)) {
      continue;
    }
    kept.push(chunk);
    keptWords.push(words);
  }
  return kept;
}

export function filterContext(chunks: readonly ContextChunk[], params?: FilterParams): ContextChunk[] {
  const quality = chunks.filter(passesQualityFilter);
  return ensureDiversity(applyUserFilters(quality, params));
}
