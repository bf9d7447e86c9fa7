/**
 * @fileoverview Core domain types
 *
 * Chunks, requests and responses shared by the retrieval pipeline,
 * ingestion and the service layer.
 *
 * @packageDocumentation
 */

// ============================================================================
// METADATA
// ============================================================================

export type MetadataScalar = string | number | boolean | null;

/**
 * Metadata stored alongside each chunk in the vector index.
 * The named keys are the ones ingestion writes; anything else the index
 * returns is kept in `extra` unchanged.
 */
export interface ChunkMetadata {
  /** Originating file name, e.g. "handbook.txt" */
  source?: string;
  /** Lower-cased extension without the dot, e.g. "txt" */
  file_type?: string;
  document_id?: string;
  chunk_index?: number;
  /** ISO timestamp of ingestion */
  ingested_at?: string;
  extra?: Record<string, MetadataScalar>;
}

// ============================================================================
// CHUNKS
// ============================================================================

export type RetrievalMethod = 'semantic';

/**
 * A retrieved unit of text. Treated as an immutable value: stages that
 * change the score or the content return a new chunk.
 */
export interface ContextChunk {
  readonly content: string;
  readonly sourceId: string;
  readonly metadata: ChunkMetadata;
  /** In [0, 1], higher is more relevant */
  readonly relevanceScore: number;
  readonly retrievalMethod: RetrievalMethod;
}

// ============================================================================
// REQUESTS
// ============================================================================

/**
 * Filters a caller may attach to a query. Only `file_type` and `min_score`
 * affect the pipeline.
 */
export interface FilterParams {
  /** Exact, case-sensitive match against metadata.file_type */
  file_type?: string;
  /** Lower bound on relevanceScore */
  min_score?: number;
  extra?: Record<string, unknown>;
}

export interface QueryRequest {
  query: string;
  maxResults: number;
  includeMetadata: boolean;
  filterParams?: FilterParams;
}

// ============================================================================
// RESPONSES
// ============================================================================

export interface SourceSummary {
  id: string;
  /** At most 200 characters of content, with "..." appended when cut */
  contentPreview: string;
  metadata: ChunkMetadata;
  relevanceScore: number;
}

export interface RAGResponse {
  query: string;
  answer: string;
  sources: SourceSummary[];
  /** Full packed chunks when the request asked for metadata, else empty */
  contextUsed: ContextChunk[];
  /** Heuristic in [0, 1], not a calibrated probability */
  confidenceScore: number;
  /** Seconds */
  processingTime: number;
  /** ISO timestamp */
  timestamp: string;
}
