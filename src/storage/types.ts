/**
 * @fileoverview Storage contracts
 *
 * The vector index is a key/value store with nearest-neighbour search.
 * Distances are whatever the index's metric yields; the retriever owns the
 * conversion to relevance.
 */

import type { ChunkMetadata } from '../types.js';

export interface VectorRecord {
  id: string;
  text: string;
  embedding: readonly number[];
  metadata: ChunkMetadata;
}

export interface StoredChunk {
  id: string;
  text: string;
  metadata: ChunkMetadata;
}

export interface VectorHit extends StoredChunk {
  distance: number;
}

export interface VectorIndex {
  /** Insert or replace records; returns their ids in input order */
  add(records: readonly VectorRecord[]): Promise<string[]>;

  /** Nearest neighbours, closest first, at most k */
  query(embedding: readonly number[], k: number): Promise<VectorHit[]>;

  /** Records for the ids that exist, in the order requested */
  get(ids: readonly string[]): Promise<StoredChunk[]>;

  delete(ids: readonly string[]): Promise<void>;

  /** Ids of every chunk ingested under a document id */
  idsForDocument(documentId: string): Promise<string[]>;

  count(): Promise<number>;

  close(): void;
}
