import { describe, expect, it } from 'vitest';
import { createRAGConfig } from '../../config/rag_config.js';
import { GenerationError } from '../../core/errors.js';
import {
  AnswerGenerator,
  buildContextString,
  buildFallbackAnswer,
  calculateConfidence,
  CONTEXT_SEPARATOR,
} from '../answer_generator.js';
import { SYSTEM_PROMPT } from '../prompts.js';
import { FakeLanguageModel, makeChunk } from '../../__tests__/fakes.js';

const config = createRAGConfig();

describe('buildContextString', () => {
  it('numbers the sources and names the origin when known', () => {
    const context = buildContextString([
      makeChunk('a', 'First', 0.9, { source: 'a.txt' }),
      makeChunk('b', 'Second', 0.8),
    ]);

    expect(context).toBe(
      `\n${CONTEXT_SEPARATOR}Source 1 (ID: a) - a.txt:\nFirst\n\nSource 2 (ID: b):\nSecond\n`,
    );
  });
});

describe('buildFallbackAnswer', () => {
  it('previews the first 500 characters of context', () => {
    const answer = buildFallbackAnswer('x'.repeat(600));

    expect(answer).toBe(
      `Based on the available context:\n\n${'x'.repeat(500)}...\n\n` +
        'I cannot provide a complete answer as the AI service is not configured.',
    );
  });
});

describe('calculateConfidence', () => {
  it('averages relevance, length, certainty and citation factors', () => {
    const answer = `Source 1 says yes. ${'a'.repeat(181)}`;
    const chunks = [makeChunk('a', 'ignored content', 0.8), makeChunk('b', 'ignored content', 0.6)];

    expect(answer).toHaveLength(200);
    expect(calculateConfidence(answer, chunks)).toBeCloseTo(0.925, 10);
  });

  it('penalises hedging and skips relevance without chunks', () => {
    const answer = "I don't know. It is unclear.";

    expect(calculateConfidence(answer, [])).toBeCloseTo((0.14 + 0.6 + 0.7) / 3, 10);
  });

  it('stays within [0, 1]', () => {
    const hedged = "I don't know, unclear, insufficient information, not enough".repeat(10);
    const chunks = [makeChunk('a', 'x', 1), makeChunk('b', 'y', 1)];

    for (const answer of ['', hedged, '[Source: a] '.repeat(50)]) {
      const score = calculateConfidence(answer, chunks);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });
});

describe('AnswerGenerator', () => {
  const chunks = [makeChunk('doc:0', 'Backups run nightly.', 0.9, { source: 'ops.md' })];

  it('falls back to a context preview without a model', async () => {
    const generator = new AnswerGenerator({ config, model: null });

    const result = await generator.generate('When do backups run?', chunks);

    expect(result.usedModel).toBe(false);
    expect(result.confidence).toBe(0.5);
    expect(result.answer).toContain('Source 1 (ID: doc:0) - ops.md:\nBackups run nightly.');
  });

  it('sends the system prompt and generation settings', async () => {
    const model = new FakeLanguageModel(() => '  Nightly [Source: doc:0].  ');
    const generator = new AnswerGenerator({ config, model });

    const result = await generator.generate('When do backups run?', chunks);

    expect(result.answer).toBe('Nightly [Source: doc:0].');
    expect(result.usedModel).toBe(true);
    expect(model.requests[0]).toMatchObject({
      system: SYSTEM_PROMPT,
      model: 'gpt-4',
      maxTokens: 1000,
      temperature: 0.3,
      topP: 0.9,
      frequencyPenalty: 0.1,
      presencePenalty: 0.1,
    });
    const prompt = model.requests[0]?.messages[0]?.content ?? '';
    expect(prompt.startsWith('Context Information:\n')).toBe(true);
    expect(prompt).toContain('\n\nQuestion: When do backups run?\n\n');
    expect(prompt.endsWith('Answer:')).toBe(true);
  });

  it('wraps model failures in GenerationError', async () => {
    const model = new FakeLanguageModel(() => {
      throw new Error('upstream 500');
    });
    const generator = new AnswerGenerator({ config, model });

    const error = await generator.generate('q', chunks).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ model: 'gpt-4', message: 'Answer generation failed: upstream 500' });
  });
});
