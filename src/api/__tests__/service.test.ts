/**
 * @fileoverview Service wiring over in-process storage and fake providers
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeEmbedder, FakeLanguageModel } from '../../__tests__/fakes.js';
import { loadServiceConfig, parseServiceConfig } from '../../config/service_config.js';
import type { FetchLike } from '../../providers/http.js';
import { NotFoundError, RateLimitError, ValidationError } from '../../core/errors.js';
import { DocumentIntelligenceService } from '../service.js';

const CONFIG = parseServiceConfig({
  storage: 'memory',
  dataDir: ':memory:',
  llm: { provider: 'none' },
  rateLimit: { maxRequests: 2, windowMs: 60_000 },
});

const HANDBOOK = 'Employees accrue twenty vacation days every calendar year.';

describe('DocumentIntelligenceService', () => {
  let service: DocumentIntelligenceService;

  afterEach(() => {
    service.close();
  });

  describe('without a language model', () => {
    beforeEach(() => {
      service = DocumentIntelligenceService.create(CONFIG, { embedder: new FakeEmbedder(), model: null });
    });

    it('answers from ingested text and logs the query', async () => {
      await service.ingestText(HANDBOOK, { source: 'handbook.txt', documentId: 'doc-1' });

      const outcome = await service.query({ query: 'How many vacation days?' }, 'client-a');

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.value.sources).toHaveLength(1);
      expect(outcome.value.sources[0]).toMatchObject({
        id: 'doc-1:0',
        contentPreview: HANDBOOK,
        relevanceScore: 1,
      });
      expect(outcome.value.answer).toContain(`Source 1 (ID: doc-1:0) - handbook.txt:\n${HANDBOOK}`);
      expect(outcome.value.confidenceScore).toBe(0.5);

      const [logged] = service.listQueries();
      expect(logged).toMatchObject({
        clientId: 'client-a',
        queryText: 'How many vacation days?',
        status: 'completed',
        sourcesCount: 1,
        maxResults: 5,
      });
    });

    it('returns a ValidationError for a bad request', async () => {
      const outcome = await service.query({ query: 'q', maxResults: 50 });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(ValidationError);
      expect(outcome.error).toMatchObject({ field: 'maxResults' });
    });

    it('rate-limits per client', async () => {
      await service.query({ query: 'first' }, 'client-a');
      await service.query({ query: 'second' }, 'client-a');

      const limited = await service.query({ query: 'third' }, 'client-a');
      const other = await service.query({ query: 'other' }, 'client-b');

      expect(limited.ok).toBe(false);
      if (limited.ok) return;
      expect(limited.error).toBeInstanceOf(RateLimitError);
      expect(other.ok).toBe(true);
      expect(service.listQueries()).toHaveLength(3);
    });

    it('deletes a document', async () => {
      await service.ingestText(HANDBOOK, { source: 'handbook.txt', documentId: 'doc-1' });

      expect(await service.deleteDocument('doc-1')).toBe(1);
      expect((await service.getStats()).totalChunks).toBe(0);
    });

    it('reports stats', async () => {
      await service.ingestText(HANDBOOK, { source: 'handbook.txt' });
      await service.query({ query: 'vacation' }, 'client-a');

      const stats = await service.getStats();

      expect(stats).toMatchObject({
        totalChunks: 1,
        storage: ':memory:',
        embedder: 'fake-embedder',
        embeddingDimensions: 3,
        languageModel: null,
      });
      expect(stats.queries.total).toBe(1);
      expect(stats.queries.completed).toBe(1);
    });

    it('is degraded without a language model', async () => {
      const health = await service.getHealth();

      expect(health.status).toBe('degraded');
      expect(health.checks.index).toEqual({ ok: true, chunks: 0 });
      expect(health.checks.languageModel).toEqual({ configured: false });
    });

    it('computes performance metrics from the query log', async () => {
      await service.ingestText(HANDBOOK, { source: 'handbook.txt' });
      await service.query({ query: 'vacation' }, 'client-a');
      await service.query({ query: '' }, 'client-b');

      const metrics = service.getPerformanceMetrics(1);

      // invalid requests are rejected before they reach the log
      expect(metrics.totalQueries).toBe(1);
      expect(metrics.successRate).toBe(1);
      expect(metrics.averageQualityScore).toBe(0.5);
      expect(metrics.windowDays).toBe(1);
    });

    it('returns the fallback evaluation', async () => {
      const outcome = await service.evaluateResponse({ query: 'q', response: 'r' });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.value.fallback).toBe(true);
      expect(outcome.value.overallScore).toBe(2.5);
    });

    it('validates evaluation requests', async () => {
      const outcome = await service.evaluateResponse({ query: 'q' });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error.field).toBe('response');
    });

    it('registers ingested documents', async () => {
      await service.ingestText(HANDBOOK, { source: 'handbook.txt', documentId: 'doc-1' });

      expect(service.listDocuments().map((document) => document.id)).toEqual(['doc-1']);
      expect(service.getDocument('doc-1')).toMatchObject({
        ok: true,
        value: { filename: 'handbook.txt', processingStatus: 'completed', chunkIds: ['doc-1:0'] },
      });
      expect((await service.getStats()).documents).toEqual({ total: 1, processing: 0, completed: 1, failed: 0 });

      await service.deleteDocument('doc-1');
      const missing = service.getDocument('doc-1');
      expect(missing.ok).toBe(false);
      if (missing.ok) return;
      expect(missing.error).toBeInstanceOf(NotFoundError);
      expect(missing.error.message).toBe('No document with id doc-1');
    });

    describe('feedback', () => {
      let queryLogId: string;

      beforeEach(async () => {
        await service.ingestText(HANDBOOK, { source: 'handbook.txt' });
        await service.query({ query: 'vacation' }, 'client-a');
        queryLogId = service.listQueries()[0].id;
      });

      it('records a rating for a logged query', () => {
        const outcome = service.submitFeedback({ queryLogId, rating: 4, wasHelpful: true }, 'client-a');

        expect(outcome).toMatchObject({
          ok: true,
          value: { queryLogId, clientId: 'client-a', rating: 4, feedbackType: 'general', wasHelpful: true },
        });
        expect(service.listFeedback()).toHaveLength(1);
      });

      it('feeds ratings into metrics and stats', async () => {
        service.submitFeedback({ queryLogId, rating: 2 }, 'client-a');
        service.submitFeedback({ queryLogId, rating: 5 }, 'client-a');

        expect(service.getPerformanceMetrics(1).userSatisfaction).toBe(5);
        expect((await service.getStats()).feedback).toEqual({
          count: 1,
          averageRating: 5,
          distribution: { 1: 0, 2: 0, 3: 0, 4: 0, 5: 1 },
        });
      });

      it('reports unknown queries and queries of other clients as not found', () => {
        const unknown = service.submitFeedback({ queryLogId: 'missing', rating: 3 }, 'client-a');
        const foreign = service.submitFeedback({ queryLogId, rating: 3 }, 'client-b');

        expect(unknown.ok).toBe(false);
        if (!unknown.ok) expect(unknown.error).toMatchObject({ resource: 'query_log', id: 'missing' });
        expect(foreign.ok).toBe(false);
        if (!foreign.ok) expect(foreign.error).toBeInstanceOf(NotFoundError);
        expect(service.listFeedback()).toEqual([]);
      });

      it('validates the rating', () => {
        const outcome = service.submitFeedback({ queryLogId, rating: 6 }, 'client-a');

        expect(outcome.ok).toBe(false);
        if (outcome.ok) return;
        expect(outcome.error).toBeInstanceOf(ValidationError);
        expect(outcome.error).toMatchObject({ field: 'rating' });
      });
    });

    it('runs an A/B test end to end', () => {
      const created = service.createAbTest({ testName: 'rerank-prompt' });
      expect(created).toMatchObject({ ok: true, value: { name: 'rerank-prompt', minimumSampleSize: 393 } });
      expect(service.assignAbVariant('rerank-prompt', 'user-1')).toBe('B');

      for (let i = 0; i < 30; i++) {
        service.recordAbResult('rerank-prompt', 'A', `control-${i}`, i % 2 === 0 ? 1 : 3);
        service.recordAbResult('rerank-prompt', 'B', `treatment-${i}`, i % 2 === 0 ? 2 : 4);
      }

      expect(service.analyzeAbTest('rerank-prompt')).toMatchObject({
        ok: true,
        value: { status: 'complete', controlMean: 2, treatmentMean: 3, lift: 50, recommendation: 'deploy' },
      });
      expect(service.listAbTests().map((test) => test.name)).toEqual(['rerank-prompt']);
    });

    it('validates A/B test settings', () => {
      const created = service.createAbTest({ testName: 'rerank-prompt', trafficSplit: 0.95 });

      expect(created.ok).toBe(false);
      if (created.ok) return;
      expect(created.error).toMatchObject({ field: 'trafficSplit' });
    });

    it('can be closed twice', () => {
      service.close();
      expect(() => service.close()).not.toThrow();
    });
  });

  describe('with a language model', () => {
    it('is healthy and names the model', async () => {
      const model = new FakeLanguageModel(() => 'ok');
      service = DocumentIntelligenceService.create(CONFIG, { embedder: new FakeEmbedder(), model });

      const health = await service.getHealth();

      expect(health.status).toBe('healthy');
      expect(health.checks.languageModel).toEqual({ configured: true, provider: 'fake', model: 'fake-model' });
      expect((await service.getStats()).languageModel).toBe('fake:fake-model');
    });

    const VERDICT = JSON.stringify({
      relevance_score: 4,
      accuracy_score: 4,
      clarity_score: 4,
      completeness_score: 4,
      reasoning: 'Grounded in the handbook.',
      confidence: 0.9,
    });

    it.each([
      {
        env: { DOCINTEL_LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret' },
        reply: { content: [{ type: 'text', text: VERDICT }] },
        generation: 'claude-3-5-sonnet-latest',
        rerank: 'claude-3-5-haiku-latest',
      },
      {
        env: { DOCINTEL_LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-secret' },
        reply: { choices: [{ message: { content: VERDICT } }] },
        generation: 'gpt-4',
        rerank: 'gpt-3.5-turbo',
      },
    ])('sends $generation and $rerank to $env.DOCINTEL_LLM_PROVIDER by default', async ({ env, reply, generation, rerank }) => {
      const models: unknown[] = [];
      const fetchImpl: FetchLike = async (_url, init) => {
        const body: unknown = JSON.parse(String(init.body));
        models.push(typeof body === 'object' && body !== null && 'model' in body ? body.model : undefined);
        return new Response(JSON.stringify(reply), { status: 200 });
      };
      const config = loadServiceConfig({
        env: { ...env, DOCINTEL_STORAGE: 'memory', DOCINTEL_DATA_DIR: ':memory:' },
        cwd: '/nonexistent/docintel',
        overrides: { rag: { finalContextChunks: 1, minRelevanceScore: 0 } },
      });
      service = DocumentIntelligenceService.create(config, { embedder: new FakeEmbedder(), fetchImpl });
      await service.ingestText(HANDBOOK, { source: 'handbook.txt' });
      await service.ingestText('Expense reports are due on the fifth business day.', { source: 'expenses.txt' });

      const outcome = await service.query({ query: 'How many vacation days?' });
      const evaluation = await service.evaluateResponse({ query: 'How many vacation days?', response: 'Twenty.' });

      expect(outcome.ok).toBe(true);
      expect(evaluation).toMatchObject({ ok: true, value: { fallback: false, overallScore: 4 } });
      expect(models).toEqual([rerank, rerank, generation, generation]);
    });
  });
});
