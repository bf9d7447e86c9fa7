/**
 * @fileoverview Command handlers against a SQLite database in a temp dir
 *
 * Each handler opens and closes its own service, so the file on disk is
 * what carries state from one command to the next.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { abtestCommand } from '../commands/abtest.js';
import { configCommand } from '../commands/config.js';
import { deleteCommand } from '../commands/delete.js';
import { documentsCommand } from '../commands/documents.js';
import { feedbackCommand } from '../commands/feedback.js';
import { healthCommand } from '../commands/health.js';
import { ingestCommand } from '../commands/ingest.js';
import { queriesCommand } from '../commands/queries.js';
import { queryCommand } from '../commands/query.js';
import { statsCommand } from '../commands/stats.js';
import type { CliContext } from '../context.js';

const HANDBOOK = 'Employees accrue twenty vacation days every calendar year.';

describe('CLI commands', () => {
  let dir: string;
  let context: CliContext;
  let output: string[];

  /** Parse the JSON the last command printed, then forget it. */
  function takeJson(): unknown {
    const text = output.join('\n');
    output = [];
    return JSON.parse(text);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docintel-cli-'));
    const configPath = path.join(dir, 'docintel.yaml');
    fs.writeFileSync(configPath, 'llm:\n  provider: none\n');
    fs.writeFileSync(path.join(dir, 'handbook.txt'), HANDBOOK);
    context = { configPath, dataDir: path.join(dir, 'data'), json: true };
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      output.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('ingests, answers, lists and deletes', async () => {
    await ingestCommand({ context, args: [path.join(dir, 'handbook.txt'), '--json'] });
    const ingested = takeJson();
    expect(ingested).toMatchObject({ documents: [{ source: 'handbook.txt', totalChunks: 1 }], skipped: [] });
    const documentId = readDocumentId(ingested);

    await queryCommand({ context, args: ['How many vacation days?', '--json'] });
    expect(takeJson()).toMatchObject({
      query: 'How many vacation days?',
      sources: [{ id: `${documentId}:0`, contentPreview: HANDBOOK }],
      confidenceScore: 0.5,
    });

    await queriesCommand({ context, args: ['--json'] });
    expect(takeJson()).toMatchObject([{ clientId: 'cli', status: 'completed', sourcesCount: 1 }]);

    await statsCommand({ context, args: ['--json'] });
    expect(takeJson()).toMatchObject({
      totalChunks: 1,
      storage: path.join(dir, 'data', 'docintel.db'),
      embedder: 'hashed',
      languageModel: null,
      queries: { total: 1, completed: 1, failed: 0 },
    });

    await deleteCommand({ context, args: [documentId, '--json'] });
    expect(takeJson()).toEqual({ documentId, chunksRemoved: 1 });

    await expect(deleteCommand({ context, args: [documentId] })).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('lists and shows registered documents', async () => {
    await ingestCommand({ context, args: [path.join(dir, 'handbook.txt'), '--json'] });
    const documentId = readDocumentId(takeJson());

    await documentsCommand({ context, args: ['--json'] });
    expect(takeJson()).toMatchObject([
      { id: documentId, filename: 'handbook.txt', fileType: 'txt', fileSize: HANDBOOK.length, processingStatus: 'completed' },
    ]);

    await documentsCommand({ context, args: [documentId, '--json'] });
    expect(takeJson()).toMatchObject({ id: documentId, totalChunks: 1, chunkIds: [`${documentId}:0`] });

    await documentsCommand({ context, args: ['--status', 'failed', '--json'] });
    expect(takeJson()).toEqual([]);

    await expect(documentsCommand({ context, args: ['missing'] })).rejects.toMatchObject({
      code: 'NOT_FOUND',
      details: { resource: 'document', id: 'missing' },
    });
    await expect(documentsCommand({ context, args: ['--status', 'done'] })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
    });
  });

  it('records feedback on a logged query', async () => {
    await ingestCommand({ context, args: [path.join(dir, 'handbook.txt')] });
    await queryCommand({ context, args: ['vacation', '--json'] });
    output = [];
    await queriesCommand({ context, args: ['--json'] });
    const queryLogId = readFirstId(takeJson());

    await feedbackCommand({ context, args: [queryLogId, '--rating', '2', '--comment', 'Too short', '--json'] });
    const first = takeJson();
    expect(first).toMatchObject({ queryLogId, clientId: 'cli', rating: 2, feedbackType: 'general', comment: 'Too short' });

    await feedbackCommand({ context, args: [queryLogId, '--rating', '5', '--type', 'accuracy', '--helpful', '--json'] });
    const second = takeJson();
    expect(second).toMatchObject({ queryLogId, rating: 5, feedbackType: 'accuracy', wasHelpful: true });
    expect(readFirstId([second])).toBe(readFirstId([first]));

    await expect(feedbackCommand({ context, args: ['missing', '--rating', '3'] })).rejects.toMatchObject({
      code: 'NOT_FOUND',
    });
    await expect(feedbackCommand({ context, args: [queryLogId, '--rating', '3', '--client-id', 'other'] })).rejects.toMatchObject({
      code: 'NOT_FOUND',
    });
    await expect(
      feedbackCommand({ context, args: [queryLogId, '--rating', '3', '--helpful', '--not-helpful'] }),
    ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });

  it('runs an A/B test', async () => {
    await abtestCommand({ context, args: ['create', 'rerank-prompt', '--split', '0.5', '--json'] });
    expect(takeJson()).toMatchObject({ name: 'rerank-prompt', trafficSplit: 0.5, minimumSampleSize: 393 });

    await abtestCommand({ context, args: ['assign', 'rerank-prompt', 'user-1', '--json'] });
    expect(takeJson()).toEqual({ testName: 'rerank-prompt', userId: 'user-1', variant: 'B' });

    await abtestCommand({ context, args: ['record', 'rerank-prompt', 'B', 'user-1', '0.8', '--json'] });
    expect(takeJson()).toMatchObject({ testName: 'rerank-prompt', variant: 'B', userId: 'user-1', outcome: 0.8 });

    await abtestCommand({ context, args: ['analyze', 'rerank-prompt', '--json'] });
    expect(takeJson()).toEqual({
      status: 'insufficient_data',
      message: 'Need at least 30 samples per variant',
      sampleSizes: { control: 0, treatment: 1 },
    });

    await abtestCommand({ context, args: ['list', '--json'] });
    expect(takeJson()).toMatchObject([{ name: 'rerank-prompt', controlVersion: 'A', treatmentVersion: 'B' }]);

    await expect(abtestCommand({ context, args: ['record', 'rerank-prompt', 'C', 'user-1', '1'] })).rejects.toMatchObject({
      code: 'VALIDATION_FAILED',
      details: { field: 'variant' },
    });
    await expect(abtestCommand({ context, args: ['record', 'rerank-prompt', 'A', 'user-1', 'high'] })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
    });
    await expect(abtestCommand({ context, args: ['analyze', 'missing'] })).rejects.toMatchObject({ code: 'NOT_FOUND' });
    await expect(abtestCommand({ context, args: ['assign', 'rerank-prompt'] })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
    });
  });

  it('passes filters through to the query', async () => {
    await ingestCommand({ context, args: [path.join(dir, 'handbook.txt')] });
    output = [];

    await queryCommand({ context, args: ['vacation', '--file-type', 'csv', '--json'] });

    // nothing survives the file-type filter, so the canned answer comes back
    expect(takeJson()).toMatchObject({ sources: [], confidenceScore: 0 });
  });

  it('reports a degraded service without a language model', async () => {
    await healthCommand({ context, args: [] });

    expect(takeJson()).toMatchObject({
      status: 'degraded',
      checks: { index: { ok: true, chunks: 0 }, languageModel: { configured: false } },
    });
  });

  it('rejects a path that matches nothing', async () => {
    await expect(ingestCommand({ context, args: [path.join(dir, 'missing', '*.txt')] })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
    });
  });

  it('rejects a query without a question', async () => {
    await expect(queryCommand({ context, args: ['--json'] })).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });

  it('turns request validation errors into VALIDATION_FAILED', async () => {
    await expect(queryCommand({ context, args: ['q', '--max-results', '50'] })).rejects.toMatchObject({
      code: 'VALIDATION_FAILED',
      details: { field: 'maxResults' },
    });
  });

  it('prints the resolved configuration', async () => {
    await configCommand({ context, args: ['--json'] });

    expect(takeJson()).toMatchObject({
      storage: 'sqlite',
      dataDir: path.join(dir, 'data'),
      llm: { provider: 'none' },
    });
  });
});

function readDocumentId(ingested: unknown): string {
  if (typeof ingested === 'object' && ingested !== null && 'documents' in ingested && Array.isArray(ingested.documents)) {
    const [first] = ingested.documents;
    if (typeof first === 'object' && first !== null && 'documentId' in first && typeof first.documentId === 'string') {
      return first.documentId;
    }
  }
  throw new Error('ingest output has no document id');
}

function readFirstId(entries: unknown): string {
  if (Array.isArray(entries)) {
    const [first] = entries;
    if (typeof first === 'object' && first !== null && 'id' in first && typeof first.id === 'string') {
      return first.id;
    }
  }
  throw new Error('output has no id');
}
