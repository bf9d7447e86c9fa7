import * as path from 'path';
import { IngestionError } from '../core/errors.js';

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export const SUPPORTED_EXTENSIONS = ['txt', 'md', 'markdown', 'csv', 'json', 'log'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export interface ChunkOptions {
  size?: number;
  overlap?: number;
}

/**
 * Collapse every whitespace run to a single space and trim.
 */
export function cleanText(text: string): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Fixed-size character windows. Each window starts `size - overlap` after
 * the previous one (or right after it when overlap >= size). Windows that
 * are only whitespace are skipped.
 */
export function createChunks(text: string, options: ChunkOptions = {}): string[] {
  const size = options.size ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;
  if (!text) return [];
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new RangeError(`chunk overlap must be a non-negative integer, got ${overlap}`);
  }

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    const end = Math.min(start + size, text.length);
    const chunk = text.slice(start, end);
    if (chunk.trim()) chunks.push(chunk);
    if (end >= text.length) break;
    start = overlap >= size ? end : start + size - overlap;
  }
  return chunks;
}

/**
 * Lower-cased extension without the dot; '' when there is none.
 */
export function fileTypeOf(fileName: string): string {
  return path.extname(fileName).slice(1).toLowerCase();
}

export function isSupportedFile(fileName: string): boolean {
  const type = fileTypeOf(fileName);
  return SUPPORTED_EXTENSIONS.some((ext) => ext === type);
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode a plain-text document. Invalid UTF-8 is read as latin1.
 */
export function extractText(fileName: string, bytes: Uint8Array): string {
  if (!isSupportedFile(fileName)) {
    throw new IngestionError(
      'unsupported_type',
      false,
      `Unsupported file type: ${path.basename(fileName)}. Supported types: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      fileName,
    );
  }
  try {
    return utf8.decode(bytes);
  } catch {
    return Buffer.from(bytes).toString('latin1');
  }
}
