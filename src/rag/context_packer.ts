import type { RAGConfig } from '../config/rag_config.js';
import type { ContextChunk } from '../types.js';

/** A truncated chunk is only worth including with at least this many tokens of room. */
export const MIN_TRUNCATION_TOKENS = 100;
export const CHARS_PER_TOKEN = 4;

export function estimateTokens(content: string): number {
  return Math.floor(content.length / CHARS_PER_TOKEN);
}

/**
 * Greedily fill the context window from relevance-ordered chunks. The first
 * chunk that does not fit is truncated into the remaining room when enough
 * is left, and packing stops there either way.
 */
export function packContext(
  chunks: readonly ContextChunk[],
  config: Pick<RAGConfig, 'maxContextLength' | 'finalContextChunks'>,
): ContextChunk[] {
  const packed: ContextChunk[] = [];
  let totalTokens = 0;

  for (const chunk of chunks) {
    if (packed.length >= config.finalContextChunks) break;

    const cost = estimateTokens(chunk.content);
    if (totalTokens + cost <= config.maxContextLength) {
      packed.push(chunk);
      totalTokens += cost;
      continue;
    }

    const remaining = config.maxContextLength - totalTokens;
    if (remaining >= MIN_TRUNCATION_TOKENS) {
      packed.push({ ...chunk, content: `${chunk.content.slice(0, remaining * CHARS_PER_TOKEN)}...` });
    }
    break;
  }

  return packed;
}
