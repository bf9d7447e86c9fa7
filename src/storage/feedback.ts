/**
 * @fileoverview Query feedback
 *
 * Ratings attached to query-log entries. Each logged query holds at most
 * one feedback entry; submitting again replaces it.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import { StorageError, type StorageOperation } from '../core/errors.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { mean } from '../utils/math.js';

// ============================================================================
// TYPES
// ============================================================================

export const FEEDBACK_TYPES = ['general', 'accuracy', 'relevance', 'speed'] as const;
export type FeedbackType = (typeof FEEDBACK_TYPES)[number];

export type FeedbackRating = 1 | 2 | 3 | 4 | 5;

export interface FeedbackInput {
  queryLogId: string;
  clientId: string;
  /** 1-5 */
  rating: number;
  feedbackType: FeedbackType;
  comment?: string;
  wasHelpful?: boolean;
  suggestedImprovement?: string;
}

export interface FeedbackEntry extends FeedbackInput {
  id: string;
  createdAt: string;
  updatedAt: string;
}

export interface ListFeedbackOptions {
  /** Defaults to 50 */
  limit?: number;
  /** ISO timestamp; only entries created at or after it */
  since?: string;
}

export interface FeedbackSummary {
  count: number;
  /** Null without feedback */
  averageRating: number | null;
  distribution: Record<FeedbackRating, number>;
}

export interface FeedbackStore {
  /** Insert, or replace the feedback already given for the query */
  record(input: FeedbackInput): FeedbackEntry;
  forQuery(queryLogId: string): FeedbackEntry | undefined;
  /** Newest first */
  list(options?: ListFeedbackOptions): FeedbackEntry[];
  summary(since?: string): FeedbackSummary;
}

interface FeedbackRow {
  id: string;
  query_log_id: string;
  client_id: string;
  rating: number;
  feedback_type: string;
  comment: string | null;
  was_helpful: number | null;
  suggested_improvement: string | null;
  created_at: string;
  updated_at: string;
}

// ============================================================================
// SHARED
// ============================================================================

function isFeedbackType(value: string): value is FeedbackType {
  return FEEDBACK_TYPES.some((type) => type === value);
}

function isRating(value: number): value is FeedbackRating {
  return value === 1 || value === 2 || value === 3 || value === 4 || value === 5;
}

export function summarizeRatings(ratings: readonly number[]): FeedbackSummary {
  const distribution: Record<FeedbackRating, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
  for (const rating of ratings) {
    if (isRating(rating)) distribution[rating] += 1;
  }
  return {
    count: ratings.length,
    averageRating: ratings.length > 0 ? mean(ratings) : null,
    distribution,
  };
}

function toEntry(row: FeedbackRow): FeedbackEntry {
  const entry: FeedbackEntry = {
    id: row.id,
    queryLogId: row.query_log_id,
    clientId: row.client_id,
    rating: row.rating,
    feedbackType: isFeedbackType(row.feedback_type) ? row.feedback_type : 'general',
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.comment !== null) entry.comment = row.comment;
  if (row.was_helpful !== null) entry.wasHelpful = row.was_helpful === 1;
  if (row.suggested_improvement !== null) entry.suggestedImprovement = row.suggested_improvement;
  return entry;
}

// ============================================================================
// STORE
// ============================================================================

export class FeedbackLog implements FeedbackStore {
  private readonly stmtUpsert: Database.Statement<
    [string, string, string, number, string, string | null, number | null, string | null, string, string]
  >;
  private readonly stmtForQuery: Database.Statement<[string], FeedbackRow>;

  constructor(private readonly db: Database.Database) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS feedback (
        id TEXT PRIMARY KEY,
        query_log_id TEXT NOT NULL UNIQUE,
        client_id TEXT NOT NULL,
        rating INTEGER NOT NULL,
        feedback_type TEXT NOT NULL,
        comment TEXT,
        was_helpful INTEGER,
        suggested_improvement TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_feedback_created ON feedback(created_at);
    `);

    this.stmtUpsert = this.db.prepare<
      [string, string, string, number, string, string | null, number | null, string | null, string, string]
    >(
      `INSERT INTO feedback (
         id, query_log_id, client_id, rating, feedback_type, comment,
         was_helpful, suggested_improvement, created_at, updated_at
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(query_log_id) DO UPDATE SET
         client_id = excluded.client_id,
         rating = excluded.rating,
         feedback_type = excluded.feedback_type,
         comment = excluded.comment,
         was_helpful = excluded.was_helpful,
         suggested_improvement = excluded.suggested_improvement,
         updated_at = excluded.updated_at`,
    );
    this.stmtForQuery = this.db.prepare<[string], FeedbackRow>('SELECT * FROM feedback WHERE query_log_id = ?');
  }

  private guard<T>(operation: StorageOperation, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageError(operation, false, `feedback: ${getErrorMessage(error)}`, toError(error));
    }
  }

  record(input: FeedbackInput): FeedbackEntry {
    const now = new Date().toISOString();
    return this.guard('write', () => {
      this.stmtUpsert.run(
        randomUUID(),
        input.queryLogId,
        input.clientId,
        input.rating,
        input.feedbackType,
        input.comment ?? null,
        input.wasHelpful === undefined ? null : Number(input.wasHelpful),
        input.suggestedImprovement ?? null,
        now,
        now,
      );
      const row = this.stmtForQuery.get(input.queryLogId);
      if (!row) throw new Error(`feedback for ${input.queryLogId} was not stored`);
      return toEntry(row);
    });
  }

  forQuery(queryLogId: string): FeedbackEntry | undefined {
    return this.guard('read', () => {
      const row = this.stmtForQuery.get(queryLogId);
      return row ? toEntry(row) : undefined;
    });
  }

  list(options: ListFeedbackOptions = {}): FeedbackEntry[] {
    const where = options.since !== undefined ? 'WHERE created_at >= ?' : '';
    const params: Array<string | number> = options.since !== undefined ? [options.since] : [];
    params.push(Math.max(1, options.limit ?? 50));

    return this.guard('read', () =>
      this.db
        .prepare<Array<string | number>, FeedbackRow>(
          `SELECT * FROM feedback ${where} ORDER BY created_at DESC, rowid DESC LIMIT ?`,
        )
        .all(...params)
        .map(toEntry),
    );
  }

  summary(since?: string): FeedbackSummary {
    const where = since !== undefined ? 'WHERE created_at >= ?' : '';
    const params = since !== undefined ? [since] : [];
    return this.guard('read', () =>
      summarizeRatings(
        this.db
          .prepare<string[], { rating: number }>(`SELECT rating FROM feedback ${where}`)
          .all(...params)
          .map((row) => row.rating),
      ),
    );
  }
}

/**
 * Map-backed feedback used with `storage: memory`.
 */
export class InMemoryFeedbackLog implements FeedbackStore {
  private readonly entries = new Map<string, FeedbackEntry>();

  record(input: FeedbackInput): FeedbackEntry {
    const now = new Date().toISOString();
    const existing = this.entries.get(input.queryLogId);
    const entry: FeedbackEntry = {
      ...input,
      id: existing?.id ?? randomUUID(),
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.entries.set(input.queryLogId, entry);
    return { ...entry };
  }

  forQuery(queryLogId: string): FeedbackEntry | undefined {
    const entry = this.entries.get(queryLogId);
    return entry ? { ...entry } : undefined;
  }

  list(options: ListFeedbackOptions = {}): FeedbackEntry[] {
    return [...this.entries.values()]
      .filter((entry) => options.since === undefined || entry.createdAt >= options.since)
      .reverse()
      .slice(0, Math.max(1, options.limit ?? 50))
      .map((entry) => ({ ...entry }));
  }

  summary(since?: string): FeedbackSummary {
    return summarizeRatings(
      [...this.entries.values()]
        .filter((entry) => since === undefined || entry.createdAt >= since)
        .map((entry) => entry.rating),
    );
  }
}
