/**
 * @fileoverview Storage module exports
 */

import type { ServiceConfig } from '../config/service_config.js';
import { resolveDatabasePath } from '../config/service_config.js';
import { InMemoryABTestStore, SqliteABTestStore, type ABTestStore } from './ab_tests.js';
import { openDatabase } from './database.js';
import { DocumentRegistry, InMemoryDocumentRegistry, type DocumentStore } from './document_registry.js';
import { FeedbackLog, InMemoryFeedbackLog, type FeedbackStore } from './feedback.js';
import { InMemoryVectorIndex } from './memory_vector_index.js';
import { InMemoryQueryLog, QueryLog, type QueryLogStore } from './query_log.js';
import { SqliteVectorIndex } from './sqlite_vector_index.js';
import type { VectorIndex } from './types.js';

export type { VectorRecord, StoredChunk, VectorHit, VectorIndex } from './types.js';
export { openDatabase } from './database.js';
export { distanceFunction, type DistanceFn } from './distance.js';
export { normalizeMetadata, flattenMetadata } from './metadata.js';
export { SqliteVectorIndex, type SqliteVectorIndexOptions } from './sqlite_vector_index.js';
export { InMemoryVectorIndex } from './memory_vector_index.js';
export {
  QueryLog,
  InMemoryQueryLog,
  type QueryLogStore,
  type QueryLogInput,
  type QueryLogEntry,
  type QueryStatus,
  type ListQueriesOptions,
  type QueryLogStats,
} from './query_log.js';
export {
  DocumentRegistry,
  InMemoryDocumentRegistry,
  PROCESSING_STATUSES,
  DEFAULT_DOCUMENT_LIST_LIMIT,
  type DocumentStore,
  type DocumentRecord,
  type DocumentCounts,
  type ListDocumentsOptions,
  type ProcessingStatus,
} from './document_registry.js';
export {
  FeedbackLog,
  InMemoryFeedbackLog,
  FEEDBACK_TYPES,
  summarizeRatings,
  type FeedbackStore,
  type FeedbackInput,
  type FeedbackEntry,
  type FeedbackType,
  type FeedbackRating,
  type FeedbackSummary,
  type ListFeedbackOptions,
} from './feedback.js';
export {
  SqliteABTestStore,
  InMemoryABTestStore,
  type ABTestStore,
  type ABTestDefinition,
  type ABTestOutcome,
} from './ab_tests.js';

export interface StorageHandles {
  index: VectorIndex;
  queryLog: QueryLogStore;
  documents: DocumentStore;
  feedback: FeedbackStore;
  abTests: ABTestStore;
  /** Where the data lives, ':memory:' for in-process storage */
  location: string;
  close(): void;
}

/**
 * Open the configured storage. The SQLite backend keeps chunks, the
 * document registry and the logs in one database file.
 */
export function createStorage(config: ServiceConfig): StorageHandles {
  const metric = config.rag.distanceMetric;

  if (config.storage === 'memory') {
    const index = new InMemoryVectorIndex(metric);
    return {
      index,
      queryLog: new InMemoryQueryLog(),
      documents: new InMemoryDocumentRegistry(),
      feedback: new InMemoryFeedbackLog(),
      abTests: new InMemoryABTestStore(),
      location: ':memory:',
      close: () => index.close(),
    };
  }

  const location = resolveDatabasePath(config);
  const db = openDatabase(location);
  const index = new SqliteVectorIndex(db, { metric });
  return {
    index,
    queryLog: new QueryLog(db),
    documents: new DocumentRegistry(db),
    feedback: new FeedbackLog(db),
    abTests: new SqliteABTestStore(db),
    location,
    close: () => {
      index.close();
      if (db.open) db.close();
    },
  };
}
