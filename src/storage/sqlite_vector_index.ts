/**
 * @fileoverview SQLite-backed vector index
 *
 * Embeddings are stored as Float32 blobs and searched with a brute-force
 * distance scan. All rows share one dimension, fixed by the first insert.
 *
 * @packageDocumentation
 */

import type Database from 'better-sqlite3';
import { StorageError, type StorageOperation } from '../core/errors.js';
import type { DistanceMetric } from '../config/rag_config.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { safeJsonParseSimple } from '../utils/safe_json.js';
import { distanceFunction, type DistanceFn } from './distance.js';
import { flattenMetadata, normalizeMetadata } from './metadata.js';
import type { StoredChunk, VectorHit, VectorIndex, VectorRecord } from './types.js';

// ============================================================================
// ROWS
// ============================================================================

interface ChunkRow {
  id: string;
  content: string;
  metadata: string;
}

interface EmbeddingRow extends ChunkRow {
  embedding: Buffer;
}

function encodeEmbedding(embedding: readonly number[]): Buffer {
  return Buffer.from(Float32Array.from(embedding).buffer);
}

function decodeEmbedding(blob: Buffer): Float32Array {
  // Copy so the view starts on a 4-byte boundary.
  const bytes = new Uint8Array(blob);
  return new Float32Array(bytes.buffer, 0, bytes.byteLength / Float32Array.BYTES_PER_ELEMENT);
}

function toStoredChunk(row: ChunkRow): StoredChunk {
  return {
    id: row.id,
    text: row.content,
    metadata: normalizeMetadata(safeJsonParseSimple(row.metadata)),
  };
}

// ============================================================================
// INDEX
// ============================================================================

export interface SqliteVectorIndexOptions {
  /** Defaults to cosine */
  metric?: DistanceMetric;
  /** Close the database when the index is closed */
  ownsConnection?: boolean;
}

export class SqliteVectorIndex implements VectorIndex {
  readonly metric: DistanceMetric;
  private readonly distance: DistanceFn;
  private readonly ownsConnection: boolean;
  private readonly stmtInsert: Database.Statement<[string, string | null, string, string, Buffer, number, string]>;
  private readonly stmtGet: Database.Statement<[string], ChunkRow>;
  private readonly stmtDelete: Database.Statement<[string]>;
  private readonly stmtScan: Database.Statement<[], EmbeddingRow>;
  private readonly stmtCount: Database.Statement<[], { total: number }>;
  private readonly stmtDimension: Database.Statement<[], { dimension: number }>;
  private readonly stmtByDocument: Database.Statement<[string], { id: string }>;

  constructor(
    private readonly db: Database.Database,
    options: SqliteVectorIndexOptions = {},
  ) {
    this.metric = options.metric ?? 'cosine';
    this.distance = distanceFunction(this.metric);
    this.ownsConnection = options.ownsConnection ?? false;

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        id TEXT PRIMARY KEY,
        document_id TEXT,
        content TEXT NOT NULL,
        metadata TEXT NOT NULL,
        embedding BLOB NOT NULL,
        dimension INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id);
    `);

    this.stmtInsert = this.db.prepare<[string, string | null, string, string, Buffer, number, string]>(
      `INSERT OR REPLACE INTO chunks (id, document_id, content, metadata, embedding, dimension, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );
    this.stmtGet = this.db.prepare<[string], ChunkRow>('SELECT id, content, metadata FROM chunks WHERE id = ?');
    this.stmtDelete = this.db.prepare<[string]>('DELETE FROM chunks WHERE id = ?');
    this.stmtScan = this.db.prepare<[], EmbeddingRow>('SELECT id, content, metadata, embedding FROM chunks');
    this.stmtCount = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM chunks');
    this.stmtDimension = this.db.prepare<[], { dimension: number }>('SELECT dimension FROM chunks LIMIT 1');
    this.stmtByDocument = this.db.prepare<[string], { id: string }>('SELECT id FROM chunks WHERE document_id = ? ORDER BY rowid');
  }

  private storedDimension(): number | undefined {
    return this.stmtDimension.get()?.dimension;
  }

  private guard<T>(operation: StorageOperation, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(operation, false, getErrorMessage(error), toError(error));
    }
  }

  async add(records: readonly VectorRecord[]): Promise<string[]> {
    if (records.length === 0) return [];

    return this.guard('write', () => {
      const expected = this.storedDimension() ?? records[0].embedding.length;
      for (const record of records) {
        if (record.embedding.length !== expected) {
          throw new StorageError(
            'write',
            false,
            `embedding for ${record.id} has ${record.embedding.length} dimensions, index uses ${expected}`,
          );
        }
      }

      const now = new Date().toISOString();
      const insertAll = this.db.transaction((batch: readonly VectorRecord[]) => {
        for (const record of batch) {
          this.stmtInsert.run(
            record.id,
            record.metadata.document_id ?? null,
            record.text,
            JSON.stringify(flattenMetadata(record.metadata)),
            encodeEmbedding(record.embedding),
            record.embedding.length,
            now,
          );
        }
      });
      insertAll(records);
      return records.map((record) => record.id);
    });
  }

  async query(embedding: readonly number[], k: number): Promise<VectorHit[]> {
    if (k <= 0) return [];

    return this.guard('query', () => {
      const dimension = this.storedDimension();
      if (dimension === undefined) return [];
      if (dimension !== embedding.length) {
        throw new StorageError('query', false, `query has ${embedding.length} dimensions, index uses ${dimension}`);
      }

      const hits: VectorHit[] = [];
      for (const row of this.stmtScan.iterate()) {
        hits.push({
          ...toStoredChunk(row),
          distance: this.distance(embedding, decodeEmbedding(row.embedding)),
        });
      }
      hits.sort((a, b) => a.distance - b.distance);
      return hits.slice(0, k);
    });
  }

  async get(ids: readonly string[]): Promise<StoredChunk[]> {
    return this.guard('read', () => {
      const found: StoredChunk[] = [];
      for (const id of ids) {
        const row = this.stmtGet.get(id);
        if (row) found.push(toStoredChunk(row));
      }
      return found;
    });
  }

  async delete(ids: readonly string[]): Promise<void> {
    this.guard('delete', () => {
      const deleteAll = this.db.transaction((batch: readonly string[]) => {
        for (const id of batch) this.stmtDelete.run(id);
      });
      deleteAll(ids);
    });
  }

  async idsForDocument(documentId: string): Promise<string[]> {
    return this.guard('read', () => this.stmtByDocument.all(documentId).map((row) => row.id));
  }

  async count(): Promise<number> {
    return this.guard('read', () => this.stmtCount.get()?.total ?? 0);
  }

  close(): void {
    if (this.ownsConnection && this.db.open) {
      this.db.close();
    }
  }
}
