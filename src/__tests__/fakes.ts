/**
 * In-process stand-ins for the provider and index contracts.
 */

import type { CompletionRequest, EmbeddingProvider, LanguageModel } from '../providers/types.js';
import type { StoredChunk, VectorHit, VectorIndex, VectorRecord } from '../storage/types.js';
import type { ChunkMetadata, ContextChunk } from '../types.js';

export function makeChunk(
  sourceId: string,
  content: string,
  relevanceScore: number,
  metadata: ChunkMetadata = {},
): ContextChunk {
  return { sourceId, content, relevanceScore, metadata, retrievalMethod: 'semantic' };
}

type Responder = (request: CompletionRequest, call: number) => string | Promise<string>;

/**
 * Records every request and answers through `respond`.
 */
export class FakeLanguageModel implements LanguageModel {
  readonly provider = 'fake';
  readonly defaultModel = 'fake-model';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request, this.requests.length);
  }
}

/**
 * Every text maps to the same vector unless `vectors` names it.
 */
export class FakeEmbedder implements EmbeddingProvider {
  readonly id = 'fake-embedder';
  readonly dimensions: number;
  readonly calls: string[][] = [];

  constructor(
    private readonly vectors: Record<string, number[]> = {},
    private readonly fallback: number[] = [1, 0, 0],
  ) {
    this.dimensions = fallback.length;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.vectors[text] ?? [...this.fallback]);
  }
}

export class FailingEmbedder implements EmbeddingProvider {
  readonly id = 'failing-embedder';
  readonly dimensions = 3;

  constructor(private readonly message = 'embedding service down') {}

  async embed(): Promise<number[][]> {
    throw new Error(this.message);
  }
}

/**
 * Returns a fixed hit list (truncated to k) whatever the query vector.
 */
export class FixedHitsIndex implements VectorIndex {
  queries = 0;

  constructor(private readonly hits: VectorHit[]) {}

  async add(records: readonly VectorRecord[]): Promise<string[]> {
    return records.map((record) => record.id);
  }

  async query(_embedding: readonly number[], k: number): Promise<VectorHit[]> {
    this.queries++;
    return this.hits.slice(0, k).map((hit) => ({ ...hit, metadata: { ...hit.metadata } }));
  }

  async get(ids: readonly string[]): Promise<StoredChunk[]> {
    return this.hits.filter((hit) => ids.includes(hit.id)).map(({ id, text, metadata }) => ({ id, text, metadata }));
  }

  async delete(): Promise<void> {}

  async idsForDocument(documentId: string): Promise<string[]> {
    return this.hits.filter((hit) => hit.metadata.document_id === documentId).map((hit) => hit.id);
  }

  async count(): Promise<number> {
    return this.hits.length;
  }

  close(): void {}
}

/**
 * Ten distinct sentences, long enough to pass the quality filter and with
 * little word overlap between them.
 */
export const DISTINCT_SENTENCES = [
  'Employees accrue twenty vacation days every calendar year.',
  'The refund window for hardware purchases is thirty days.',
  'Quarterly revenue grew strongly across European markets.',
  'Password resets require a verified recovery email address.',
  'Office badges must be returned when leaving permanently.',
  'Support tickets get answered within one business day.',
  'Travel expenses above five hundred dollars need approval.',
  'Backups run nightly and remain stored for ninety days.',
  'New laptops ship with encrypted disks already enabled.',
  'Parking permits renew automatically each January first.',
] as const;

/**
 * Hits for DISTINCT_SENTENCES with cosine distances 0.05, 0.10, ... 0.50,
 * i.e. relevance 0.95 down to 0.50.
 */
export function tenGradedHits(): VectorHit[] {
  return DISTINCT_SENTENCES.map((text, i) => ({
    id: `c${i + 1}`,
    text,
    distance: (i + 1) * 0.05,
    metadata: { source: 'handbook.txt', file_type: 'txt', chunk_index: i },
  }));
}
