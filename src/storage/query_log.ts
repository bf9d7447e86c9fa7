/**
 * @fileoverview Query log
 *
 * One row per processed query, written by the service after the pipeline
 * finishes. Backs `listQueries` and the performance metrics.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import { StorageError, type StorageOperation } from '../core/errors.js';
import type { FilterParams } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { mean } from '../utils/math.js';
import { safeJsonParseSimple } from '../utils/safe_json.js';

// ============================================================================
// TYPES
// ============================================================================

export type QueryStatus = 'completed' | 'failed';

export interface QueryLogInput {
  clientId: string;
  queryText: string;
  responseText: string | null;
  confidenceScore: number | null;
  /** Seconds */
  processingTime: number;
  sourcesCount: number;
  status: QueryStatus;
  errorMessage?: string;
  maxResults: number;
  filterParams?: FilterParams;
}

export interface QueryLogEntry extends QueryLogInput {
  id: string;
  createdAt: string;
}

export interface ListQueriesOptions {
  /** Defaults to 50 */
  limit?: number;
  clientId?: string;
  status?: QueryStatus;
  /** ISO timestamp; only entries created at or after it */
  since?: string;
}

export interface QueryLogStats {
  total: number;
  completed: number;
  failed: number;
  /** Seconds, over completed queries */
  averageProcessingTime: number;
  averageConfidence: number;
}

export interface QueryLogStore {
  record(input: QueryLogInput): QueryLogEntry;
  get(id: string): QueryLogEntry | undefined;
  list(options?: ListQueriesOptions): QueryLogEntry[];
  stats(): QueryLogStats;
}

interface QueryLogRow {
  id: string;
  client_id: string;
  query_text: string;
  response_text: string | null;
  confidence_score: number | null;
  processing_time: number;
  sources_count: number;
  status: string;
  error_message: string | null;
  max_results: number;
  filter_params: string | null;
  created_at: string;
}

interface StatsRow {
  total: number;
  completed: number | null;
  failed: number | null;
  avg_time: number | null;
  avg_confidence: number | null;
}

// ============================================================================
// ROW MAPPING
// ============================================================================

function parseFilterParams(raw: string | null): FilterParams | undefined {
  if (raw === null) return undefined;
  const value = safeJsonParseSimple(raw);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;

  const params: FilterParams = {};
  for (const [key, entry] of Object.entries(value)) {
    if (key === 'file_type' && typeof entry === 'string') params.file_type = entry;
    else if (key === 'min_score' && typeof entry === 'number') params.min_score = entry;
    else if (key === 'extra' && typeof entry === 'object' && entry !== null && !Array.isArray(entry)) {
      params.extra = Object.fromEntries(Object.entries(entry));
    }
  }
  return params;
}

function toEntry(row: QueryLogRow): QueryLogEntry {
  const entry: QueryLogEntry = {
    id: row.id,
    clientId: row.client_id,
    queryText: row.query_text,
    responseText: row.response_text,
    confidenceScore: row.confidence_score,
    processingTime: row.processing_time,
    sourcesCount: row.sources_count,
    status: row.status === 'failed' ? 'failed' : 'completed',
    maxResults: row.max_results,
    createdAt: row.created_at,
  };
  if (row.error_message !== null) entry.errorMessage = row.error_message;
  const filterParams = parseFilterParams(row.filter_params);
  if (filterParams) entry.filterParams = filterParams;
  return entry;
}

// ============================================================================
// STORE
// ============================================================================

export class QueryLog implements QueryLogStore {
  private readonly stmtInsert: Database.Statement<
    [string, string, string, string | null, number | null, number, number, string, string | null, number, string | null, string]
  >;
  private readonly stmtGet: Database.Statement<[string], QueryLogRow>;
  private readonly stmtStats: Database.Statement<[], StatsRow>;

  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS query_logs (
        id TEXT PRIMARY KEY,
        client_id TEXT NOT NULL,
        query_text TEXT NOT NULL,
        response_text TEXT,
        confidence_score REAL,
        processing_time REAL NOT NULL,
        sources_count INTEGER NOT NULL,
        status TEXT NOT NULL,
        error_message TEXT,
        max_results INTEGER NOT NULL,
        filter_params TEXT,
        created_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_query_logs_created ON query_logs(created_at);
      CREATE INDEX IF NOT EXISTS idx_query_logs_client ON query_logs(client_id);
    `);

    this.stmtInsert = this.db.prepare<
      [string, string, string, string | null, number | null, number, number, string, string | null, number, string | null, string]
    >(
      `INSERT INTO query_logs (
         id, client_id, query_text, response_text, confidence_score, processing_time,
         sources_count, status, error_message, max_results, filter_params, created_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    this.stmtGet = this.db.prepare<[string], QueryLogRow>('SELECT * FROM query_logs WHERE id = ?');
    this.stmtStats = this.db.prepare<[], StatsRow>(
      `SELECT
         COUNT(*) AS total,
         SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END) AS completed,
         SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed,
         AVG(CASE WHEN status = 'completed' THEN processing_time END) AS avg_time,
         AVG(CASE WHEN status = 'completed' THEN confidence_score END) AS avg_confidence
       FROM query_logs`,
    );
  }

  private guard<T>(operation: StorageOperation, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageError(operation, false, `query_logs: ${getErrorMessage(error)}`, toError(error));
    }
  }

  record(input: QueryLogInput): QueryLogEntry {
    const entry: QueryLogEntry = { ...input, id: randomUUID(), createdAt: new Date().toISOString() };
    this.guard('write', () =>
      this.stmtInsert.run(
        entry.id,
        entry.clientId,
        entry.queryText,
        entry.responseText,
        entry.confidenceScore,
        entry.processingTime,
        entry.sourcesCount,
        entry.status,
        entry.errorMessage ?? null,
        entry.maxResults,
        entry.filterParams ? JSON.stringify(entry.filterParams) : null,
        entry.createdAt,
      ),
    );
    return entry;
  }

  get(id: string): QueryLogEntry | undefined {
    return this.guard('read', () => {
      const row = this.stmtGet.get(id);
      return row ? toEntry(row) : undefined;
    });
  }

  /** Newest first */
  list(options: ListQueriesOptions = {}): QueryLogEntry[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (options.clientId !== undefined) {
      clauses.push('client_id = ?');
      params.push(options.clientId);
    }
    if (options.status !== undefined) {
      clauses.push('status = ?');
      params.push(options.status);
    }
    if (options.since !== undefined) {
      clauses.push('created_at >= ?');
      params.push(options.since);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(Math.max(1, options.limit ?? 50));

    return this.guard('read', () =>
      this.db
        .prepare<Array<string | number>, QueryLogRow>(
          `SELECT * FROM query_logs ${where} ORDER BY created_at DESC, rowid DESC LIMIT ?`,
        )
        .all(...params)
        .map(toEntry),
    );
  }

  stats(): QueryLogStats {
    return this.guard('read', () => {
      const row = this.stmtStats.get();
      return {
        total: row?.total ?? 0,
        completed: row?.completed ?? 0,
        failed: row?.failed ?? 0,
        averageProcessingTime: row?.avg_time ?? 0,
        averageConfidence: row?.avg_confidence ?? 0,
      };
    });
  }
}

/**
 * Array-backed log used with `storage: memory`.
 */
export class InMemoryQueryLog implements QueryLogStore {
  private readonly entries: QueryLogEntry[] = [];

  record(input: QueryLogInput): QueryLogEntry {
    const entry: QueryLogEntry = { ...input, id: randomUUID(), createdAt: new Date().toISOString() };
    this.entries.push(entry);
    return entry;
  }

  get(id: string): QueryLogEntry | undefined {
    return this.entries.find((entry) => entry.id === id);
  }

  list(options: ListQueriesOptions = {}): QueryLogEntry[] {
    return this.entries
      .filter((entry) => options.clientId === undefined || entry.clientId === options.clientId)
      .filter((entry) => options.status === undefined || entry.status === options.status)
      .filter((entry) => options.since === undefined || entry.createdAt >= options.since)
      .reverse()
      .slice(0, Math.max(1, options.limit ?? 50));
  }

  stats(): QueryLogStats {
    const completed = this.entries.filter((entry) => entry.status === 'completed');
    const confidences = completed
      .map((entry) => entry.confidenceScore)
      .filter((value): value is number => value !== null);
    return {
      total: this.entries.length,
      completed: completed.length,
      failed: this.entries.length - completed.length,
      averageProcessingTime: mean(completed.map((entry) => entry.processingTime)),
      averageConfidence: mean(confidences),
    };
  }
}
