/**
 * @fileoverview Document ingestion
 *
 * Turns a document into indexed chunks: decode, clean, chunk, embed, store.
 * Every chunk of a document shares its document id so the document can be
 * deleted as a unit. With a document store attached, each document is
 * registered as processing and then marked completed or failed.
 *
 * @packageDocumentation
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { glob } from 'glob';
import { IngestionError, isDocIntelError, isRetryableError } from '../core/errors.js';
import type { EmbeddingProvider } from '../providers/types.js';
import type { DocumentRecord, DocumentStore } from '../storage/document_registry.js';
import type { VectorIndex, VectorRecord } from '../storage/types.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import type { ChunkMetadata, MetadataScalar } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  cleanText,
  createChunks,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  extractText,
  fileTypeOf,
  SUPPORTED_EXTENSIONS,
} from './text_processing.js';

// ============================================================================
// TYPES
// ============================================================================

export interface IngestTextOptions {
  /** Recorded as metadata.source, e.g. the file name */
  source: string;
  /** Defaults to the extension of `source` */
  fileType?: string;
  /** Defaults to a fresh UUID */
  documentId?: string;
  chunkSize?: number;
  chunkOverlap?: number;
  /** Bytes; defaults to the UTF-8 length of the text */
  fileSize?: number;
  /** Extra scalar metadata stored on every chunk */
  extra?: Record<string, MetadataScalar>;
}

export interface IngestedDocument {
  documentId: string;
  source: string;
  fileType: string;
  chunkIds: string[];
  totalChunks: number;
  chunkSize: number;
  chunkOverlap: number;
  originalLength: number;
  cleanedLength: number;
}

export interface SkippedPath {
  path: string;
  reason: string;
}

export interface IngestPathsResult {
  documents: IngestedDocument[];
  skipped: SkippedPath[];
}

export interface IngestPathsOptions {
  /** Base for relative inputs; defaults to process.cwd() */
  cwd?: string;
  /** Called after each file, whether it was ingested or skipped */
  onProgress?: (completed: number, total: number, file: string) => void;
}

export interface DocumentIngestorOptions {
  embedder: EmbeddingProvider;
  index: VectorIndex;
  /** Registry of ingested documents and their processing status */
  documents?: DocumentStore;
  chunkSize?: number;
  chunkOverlap?: number;
  /** Texts per embed() call */
  embedBatchSize?: number;
}

const DEFAULT_EMBED_BATCH_SIZE = 64;
const SUPPORTED_GLOB = `**/*.{${SUPPORTED_EXTENSIONS.join(',')}}`;

// ============================================================================
// INGESTOR
// ============================================================================

export class DocumentIngestor {
  private readonly embedder: EmbeddingProvider;
  private readonly index: VectorIndex;
  private readonly documents?: DocumentStore;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly embedBatchSize: number;

  constructor(options: DocumentIngestorOptions) {
    this.embedder = options.embedder;
    this.index = options.index;
    this.documents = options.documents;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
    this.embedBatchSize = Math.max(1, options.embedBatchSize ?? DEFAULT_EMBED_BATCH_SIZE);
  }

  async ingestText(text: string, options: IngestTextOptions): Promise<IngestedDocument> {
    const documentId = options.documentId ?? randomUUID();
    const fileType = options.fileType ?? fileTypeOf(options.source);
    const chunkSize = options.chunkSize ?? this.chunkSize;
    const chunkOverlap = options.chunkOverlap ?? this.chunkOverlap;
    const startedAt = new Date().toISOString();
    const registered: DocumentRecord = {
      id: documentId,
      filename: options.source,
      fileType,
      fileSize: options.fileSize ?? Buffer.byteLength(text, 'utf8'),
      totalChunks: 0,
      chunkSize,
      chunkOverlap,
      processingStatus: 'processing',
      chunkIds: [],
      createdAt: startedAt,
      updatedAt: startedAt,
    };
    this.documents?.save(registered);

    try {
      const ingested = await this.process(text, options, { documentId, fileType, chunkSize, chunkOverlap });
      const processedAt = new Date().toISOString();
      this.documents?.save({
        ...registered,
        processingStatus: 'completed',
        totalChunks: ingested.totalChunks,
        chunkIds: ingested.chunkIds,
        updatedAt: processedAt,
        processedAt,
      });
      return ingested;
    } catch (error) {
      this.documents?.save({
        ...registered,
        processingStatus: 'failed',
        errorMessage: getErrorMessage(error),
        updatedAt: new Date().toISOString(),
      });
      throw error;
    }
  }

  private async process(
    text: string,
    options: IngestTextOptions,
    target: { documentId: string; fileType: string; chunkSize: number; chunkOverlap: number },
  ): Promise<IngestedDocument> {
    const { documentId, fileType, chunkSize, chunkOverlap } = target;
    const cleaned = cleanText(text);
    if (!cleaned) {
      throw new IngestionError('empty_document', false, `${options.source} has no text`, options.source);
    }

    const chunks = createChunks(cleaned, { size: chunkSize, overlap: chunkOverlap });
    const ingestedAt = new Date().toISOString();

    const embeddings = await this.embedChunks(chunks, options.source);
    const records: VectorRecord[] = chunks.map((content, chunkIndex) => {
      const metadata: ChunkMetadata = {
        source: options.source,
        file_type: fileType,
        document_id: documentId,
        chunk_index: chunkIndex,
        ingested_at: ingestedAt,
      };
      if (options.extra && Object.keys(options.extra).length > 0) {
        metadata.extra = { ...options.extra };
      }
      return { id: `${documentId}:${chunkIndex}`, text: content, embedding: embeddings[chunkIndex], metadata };
    });

    let chunkIds: string[];
    try {
      chunkIds = await this.index.add(records);
    } catch (error) {
      throw new IngestionError(
        'store_failed',
        isRetryableError(error),
        `could not store chunks: ${getErrorMessage(error)}`,
        options.source,
      );
    }

    logInfo(`Ingested ${chunks.length} chunks for document: ${options.source}`, { documentId });
    return {
      documentId,
      source: options.source,
      fileType,
      chunkIds,
      totalChunks: chunks.length,
      chunkSize,
      chunkOverlap,
      originalLength: text.length,
      cleanedLength: cleaned.length,
    };
  }

  async ingestFile(filePath: string, options: Partial<IngestTextOptions> = {}): Promise<IngestedDocument> {
    const source = options.source ?? path.basename(filePath);
    let bytes: Uint8Array;
    try {
      bytes = await fs.readFile(filePath);
    } catch (error) {
      throw new IngestionError('read_failed', false, getErrorMessage(error), filePath);
    }
    const text = extractText(filePath, bytes);
    return this.ingestText(text, { ...options, source, fileSize: options.fileSize ?? bytes.byteLength });
  }

  /**
   * Ingest files, directories and glob patterns. Directories expand to the
   * supported files beneath them. Files that fail are reported in
   * `skipped` and do not stop the rest.
   */
  async ingestPaths(inputs: readonly string[], options: IngestPathsOptions = {}): Promise<IngestPathsResult> {
    const files = await this.expand(inputs, options.cwd ?? process.cwd());
    const documents: IngestedDocument[] = [];
    const skipped: SkippedPath[] = [];

    for (const [position, file] of files.entries()) {
      try {
        documents.push(await this.ingestFile(file));
      } catch (error) {
        if (!isDocIntelError(error)) throw error;
        logWarning(`Skipped ${file}`, { error: error.message });
        skipped.push({ path: file, reason: error.message });
      }
      options.onProgress?.(position + 1, files.length, file);
    }
    return { documents, skipped };
  }

  /**
   * Removes every chunk of the document and its registry entry; returns
   * how many chunks were removed.
   */
  async deleteDocument(documentId: string): Promise<number> {
    const ids = await this.index.idsForDocument(documentId);
    if (ids.length > 0) {
      await this.index.delete(ids);
    }
    this.documents?.delete(documentId);
    return ids.length;
  }

  private async expand(inputs: readonly string[], cwd: string): Promise<string[]> {
    const files: string[] = [];
    for (const input of inputs) {
      const resolved = path.resolve(cwd, input);
      const stat = await fs.stat(resolved).catch(() => null);
      if (stat?.isFile()) {
        files.push(resolved);
        continue;
      }
      const matches = await glob(stat?.isDirectory() ? SUPPORTED_GLOB : input, {
        cwd: stat?.isDirectory() ? resolved : cwd,
        absolute: true,
        follow: false,
        nodir: true,
      });
      files.push(...matches.sort());
    }
    return [...new Set(files)];
  }

  private async embedChunks(chunks: readonly string[], source: string): Promise<number[][]> {
    const embeddings: number[][] = [];
    try {
      for (let start = 0; start < chunks.length; start += this.embedBatchSize) {
        const batch = chunks.slice(start, start + this.embedBatchSize);
        const vectors = await this.embedder.embed(batch);
        if (vectors.length !== batch.length) {
          throw new Error(`${this.embedder.id} returned ${vectors.length} embeddings for ${batch.length} chunks`);
        }
        embeddings.push(...vectors);
      }
    } catch (error) {
      throw new IngestionError('embed_failed', isRetryableError(error), getErrorMessage(error), source);
    }
    return embeddings;
  }
}
