import type { DistanceMetric } from '../config/rag_config.js';
import { StorageError } from '../core/errors.js';
import { distanceFunction, type DistanceFn } from './distance.js';
import type { StoredChunk, VectorHit, VectorIndex, VectorRecord } from './types.js';

interface Entry {
  record: StoredChunk;
  embedding: readonly number[];
}

/**
 * Map-backed index for tests and `storage: memory`. Same contract as the
 * SQLite index; nothing survives close().
 */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly entries = new Map<string, Entry>();
  private readonly distance: DistanceFn;
  private dimension: number | undefined;

  constructor(readonly metric: DistanceMetric = 'cosine') {
    this.distance = distanceFunction(metric);
  }

  async add(records: readonly VectorRecord[]): Promise<string[]> {
    const expected = this.dimension ?? records[0]?.embedding.length;
    for (const record of records) {
      if (record.embedding.length !== expected) {
        throw new StorageError(
          'write',
          false,
          `embedding for ${record.id} has ${record.embedding.length} dimensions, index uses ${expected}`,
        );
      }
    }
    for (const record of records) {
      // Re-inserting moves the id to the end, matching INSERT OR REPLACE.
      this.entries.delete(record.id);
      this.entries.set(record.id, {
        record: { id: record.id, text: record.text, metadata: { ...record.metadata } },
        embedding: [...record.embedding],
      });
    }
    if (records.length > 0) this.dimension = expected;
    return records.map((record) => record.id);
  }

  async query(embedding: readonly number[], k: number): Promise<VectorHit[]> {
    if (k <= 0 || this.entries.size === 0) return [];
    if (embedding.length !== this.dimension) {
      throw new StorageError('query', false, `query has ${embedding.length} dimensions, index uses ${this.dimension}`);
    }
    const hits: VectorHit[] = [];
    for (const { record, embedding: stored } of this.entries.values()) {
      hits.push({ ...record, distance: this.distance(embedding, stored) });
    }
    hits.sort((a, b) => a.distance - b.distance);
    return hits.slice(0, k);
  }

  async get(ids: readonly string[]): Promise<StoredChunk[]> {
    const found: StoredChunk[] = [];
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) found.push(entry.record);
    }
    return found;
  }

  async delete(ids: readonly string[]): Promise<void> {
    for (const id of ids) this.entries.delete(id);
    if (this.entries.size === 0) this.dimension = undefined;
  }

  async idsForDocument(documentId: string): Promise<string[]> {
    const ids: string[] = [];
    for (const { record } of this.entries.values()) {
      if (record.metadata.document_id === documentId) ids.push(record.id);
    }
    return ids;
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  close(): void {
    this.entries.clear();
    this.dimension = undefined;
  }
}
