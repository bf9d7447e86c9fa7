import { describe, expect, it } from 'vitest';
import { estimateTokens, packContext } from '../context_packer.js';
import { DISTINCT_SENTENCES, makeChunk } from '../../__tests__/fakes.js';

describe('estimateTokens', () => {
  it('is the floor of length / 4', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abc')).toBe(0);
    expect(estimateTokens('abcdefghi')).toBe(2);
  });
});

describe('packContext', () => {
  it('returns at most finalContextChunks chunks', () => {
    const chunks = DISTINCT_SENTENCES.map((text, i) => makeChunk(`c${i}`, text, 1 - i / 10));

    const packed = packContext(chunks, { maxContextLength: 4000, finalContextChunks: 5 });

    expect(packed.map((c) => c.sourceId)).toEqual(['c0', 'c1', 'c2', 'c3', 'c4']);
  });

  it('stops at the first chunk that does not fit when too little room is left', () => {
    const a = makeChunk('a', 'a'.repeat(400), 0.9);
    const b = makeChunk('b', 'b'.repeat(400), 0.8);
    const c = makeChunk('c', 'c'.repeat(4), 0.7);

    const packed = packContext([a, b, c], { maxContextLength: 150, finalContextChunks: 5 });

    expect(packed).toEqual([a]);
  });

  it('truncates the first chunk that does not fit when enough room is left', () => {
    const a = makeChunk('a', 'a'.repeat(400), 0.9);
    const b = makeChunk('b', 'b'.repeat(1000), 0.8);
    const c = makeChunk('c', 'c'.repeat(4), 0.7);

    const packed = packContext([a, b, c], { maxContextLength: 250, finalContextChunks: 5 });

    expect(packed).toHaveLength(2);
    expect(packed[1]?.sourceId).toBe('b');
    expect(packed[1]?.content).toBe(`${'b'.repeat(600)}...`);
    expect(packed[1]?.relevanceScore).toBe(0.8);
    expect(b.content).toHaveLength(1000);
  });

  it('truncates when exactly 100 tokens remain', () => {
    const a = makeChunk('a', 'a'.repeat(400), 0.9);
    const b = makeChunk('b', 'b'.repeat(1000), 0.8);

    const packed = packContext([a, b], { maxContextLength: 200, finalContextChunks: 5 });

    expect(packed[1]?.content).toBe(`${'b'.repeat(400)}...`);
  });

  it('keeps the estimated total within the budget', () => {
    const chunks = [300, 500, 700, 900, 1100].map((len, i) => makeChunk(`c${i}`, 'x'.repeat(len), 0.9 - i / 10));

    const packed = packContext(chunks, { maxContextLength: 500, finalContextChunks: 5 });
    const total = packed.reduce((sum, chunk) => sum + estimateTokens(chunk.content), 0);

    expect(total).toBeLessThanOrEqual(500);
  });

  it('returns nothing for an empty list', () => {
    expect(packContext([], { maxContextLength: 4000, finalContextChunks: 5 })).toEqual([]);
  });
});
