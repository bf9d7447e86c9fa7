/**
 * @fileoverview Document registry
 *
 * One row per ingested document, tracking its processing status alongside
 * the chunks in the vector index. A failed ingestion stays listed with its
 * error so operators can see what was rejected.
 *
 * @packageDocumentation
 */

import type Database from 'better-sqlite3';
import { StorageError, type StorageOperation } from '../core/errors.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { safeJsonParseSimple } from '../utils/safe_json.js';

// ============================================================================
// TYPES
// ============================================================================

export type ProcessingStatus = 'processing' | 'completed' | 'failed';

export const PROCESSING_STATUSES: readonly ProcessingStatus[] = ['processing', 'completed', 'failed'];

export interface DocumentRecord {
  id: string;
  /** The source name given at ingestion, usually the file name */
  filename: string;
  fileType: string;
  /** Bytes */
  fileSize: number;
  totalChunks: number;
  chunkSize: number;
  chunkOverlap: number;
  processingStatus: ProcessingStatus;
  errorMessage?: string;
  chunkIds: string[];
  createdAt: string;
  updatedAt: string;
  processedAt?: string;
}

export interface ListDocumentsOptions {
  /** Defaults to 100 */
  limit?: number;
  offset?: number;
  fileType?: string;
  status?: ProcessingStatus;
}

export interface DocumentCounts {
  total: number;
  processing: number;
  completed: number;
  failed: number;
}

export interface DocumentStore {
  /**
   * Insert or replace a document. Re-saving an id keeps its original
   * creation time; the stored record is returned.
   */
  save(record: DocumentRecord): DocumentRecord;
  get(id: string): DocumentRecord | undefined;
  /** Newest first */
  list(options?: ListDocumentsOptions): DocumentRecord[];
  /** True when a row was removed */
  delete(id: string): boolean;
  counts(): DocumentCounts;
}

export const DEFAULT_DOCUMENT_LIST_LIMIT = 100;

interface DocumentRow {
  id: string;
  filename: string;
  file_type: string;
  file_size: number;
  total_chunks: number;
  chunk_size: number;
  chunk_overlap: number;
  processing_status: string;
  error_message: string | null;
  chunk_ids: string;
  created_at: string;
  updated_at: string;
  processed_at: string | null;
}

interface CountRow {
  processing_status: string;
  n: number;
}

// ============================================================================
// ROW MAPPING
// ============================================================================

function parseStatus(raw: string): ProcessingStatus {
  return raw === 'completed' || raw === 'failed' ? raw : 'processing';
}

function parseChunkIds(raw: string): string[] {
  const value = safeJsonParseSimple(raw);
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string');
}

function toRecord(row: DocumentRow): DocumentRecord {
  const record: DocumentRecord = {
    id: row.id,
    filename: row.filename,
    fileType: row.file_type,
    fileSize: row.file_size,
    totalChunks: row.total_chunks,
    chunkSize: row.chunk_size,
    chunkOverlap: row.chunk_overlap,
    processingStatus: parseStatus(row.processing_status),
    chunkIds: parseChunkIds(row.chunk_ids),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.error_message !== null) record.errorMessage = row.error_message;
  if (row.processed_at !== null) record.processedAt = row.processed_at;
  return record;
}

function emptyCounts(): DocumentCounts {
  return { total: 0, processing: 0, completed: 0, failed: 0 };
}

// ============================================================================
// STORE
// ============================================================================

export class DocumentRegistry implements DocumentStore {
  private readonly stmtUpsert: Database.Statement<
    [string, string, string, number, number, number, number, string, string | null, string, string, string, string | null]
  >;
  private readonly stmtGet: Database.Statement<[string], DocumentRow>;
  private readonly stmtDelete: Database.Statement<[string]>;
  private readonly stmtCounts: Database.Statement<[], CountRow>;

  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        filename TEXT NOT NULL,
        file_type TEXT NOT NULL,
        file_size INTEGER NOT NULL,
        total_chunks INTEGER NOT NULL,
        chunk_size INTEGER NOT NULL,
        chunk_overlap INTEGER NOT NULL,
        processing_status TEXT NOT NULL,
        error_message TEXT,
        chunk_ids TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        processed_at TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_documents_created ON documents(created_at);
      CREATE INDEX IF NOT EXISTS idx_documents_status ON documents(processing_status);
    `);

    this.stmtUpsert = this.db.prepare<
      [string, string, string, number, number, number, number, string, string | null, string, string, string, string | null]
    >(
      `INSERT INTO documents (
         id, filename, file_type, file_size, total_chunks, chunk_size, chunk_overlap,
         processing_status, error_message, chunk_ids, created_at, updated_at, processed_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         filename = excluded.filename,
         file_type = excluded.file_type,
         file_size = excluded.file_size,
         total_chunks = excluded.total_chunks,
         chunk_size = excluded.chunk_size,
         chunk_overlap = excluded.chunk_overlap,
         processing_status = excluded.processing_status,
         error_message = excluded.error_message,
         chunk_ids = excluded.chunk_ids,
         updated_at = excluded.updated_at,
         processed_at = excluded.processed_at`,
    );
    this.stmtGet = this.db.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?');
    this.stmtDelete = this.db.prepare<[string]>('DELETE FROM documents WHERE id = ?');
    this.stmtCounts = this.db.prepare<[], CountRow>(
      'SELECT processing_status, COUNT(*) AS n FROM documents GROUP BY processing_status',
    );
  }

  private guard<T>(operation: StorageOperation, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageError(operation, false, `documents: ${getErrorMessage(error)}`, toError(error));
    }
  }

  save(record: DocumentRecord): DocumentRecord {
    return this.guard('write', () => {
      this.stmtUpsert.run(
        record.id,
        record.filename,
        record.fileType,
        record.fileSize,
        record.totalChunks,
        record.chunkSize,
        record.chunkOverlap,
        record.processingStatus,
        record.errorMessage ?? null,
        JSON.stringify(record.chunkIds),
        record.createdAt,
        record.updatedAt,
        record.processedAt ?? null,
      );
      const row = this.stmtGet.get(record.id);
      return row ? toRecord(row) : record;
    });
  }

  get(id: string): DocumentRecord | undefined {
    return this.guard('read', () => {
      const row = this.stmtGet.get(id);
      return row ? toRecord(row) : undefined;
    });
  }

  list(options: ListDocumentsOptions = {}): DocumentRecord[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (options.fileType !== undefined) {
      clauses.push('file_type = ?');
      params.push(options.fileType);
    }
    if (options.status !== undefined) {
      clauses.push('processing_status = ?');
      params.push(options.status);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(Math.max(1, options.limit ?? DEFAULT_DOCUMENT_LIST_LIMIT), Math.max(0, options.offset ?? 0));

    return this.guard('read', () =>
      this.db
        .prepare<Array<string | number>, DocumentRow>(
          `SELECT * FROM documents ${where} ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`,
        )
        .all(...params)
        .map(toRecord),
    );
  }

  delete(id: string): boolean {
    return this.guard('delete', () => this.stmtDelete.run(id).changes > 0);
  }

  counts(): DocumentCounts {
    return this.guard('read', () => {
      const counts = emptyCounts();
      for (const row of this.stmtCounts.all()) {
        counts[parseStatus(row.processing_status)] += row.n;
        counts.total += row.n;
      }
      return counts;
    });
  }
}

/**
 * Map-backed registry used with `storage: memory`.
 */
export class InMemoryDocumentRegistry implements DocumentStore {
  private readonly records = new Map<string, DocumentRecord>();

  save(record: DocumentRecord): DocumentRecord {
    const existing = this.records.get(record.id);
    const stored: DocumentRecord = {
      ...record,
      chunkIds: [...record.chunkIds],
      createdAt: existing?.createdAt ?? record.createdAt,
    };
    this.records.set(record.id, stored);
    return { ...stored, chunkIds: [...stored.chunkIds] };
  }

  get(id: string): DocumentRecord | undefined {
    const record = this.records.get(id);
    return record ? { ...record, chunkIds: [...record.chunkIds] } : undefined;
  }

  list(options: ListDocumentsOptions = {}): DocumentRecord[] {
    const offset = Math.max(0, options.offset ?? 0);
    return [...this.records.values()]
      .filter((record) => options.fileType === undefined || record.fileType === options.fileType)
      .filter((record) => options.status === undefined || record.processingStatus === options.status)
      .reverse()
      .slice(offset, offset + Math.max(1, options.limit ?? DEFAULT_DOCUMENT_LIST_LIMIT))
      .map((record) => ({ ...record, chunkIds: [...record.chunkIds] }));
  }

  delete(id: string): boolean {
    return this.records.delete(id);
  }

  counts(): DocumentCounts {
    const counts = emptyCounts();
    for (const record of this.records.values()) {
      counts[record.processingStatus] += 1;
      counts.total += 1;
    }
    return counts;
  }
}
