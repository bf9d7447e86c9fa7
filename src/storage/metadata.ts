import type { ChunkMetadata, MetadataScalar } from '../types.js';

function isScalar(value: unknown): value is MetadataScalar {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

/**
 * Split a loose metadata object into the typed keys and an `extra` bucket.
 * Known keys with the wrong type move to `extra`; non-scalar values are
 * dropped.
 */
export function normalizeMetadata(raw: unknown): ChunkMetadata {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return {};

  const metadata: ChunkMetadata = {};
  const extra: Record<string, MetadataScalar> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'source' && typeof value === 'string') metadata.source = value;
    else if (key === 'file_type' && typeof value === 'string') metadata.file_type = value;
    else if (key === 'document_id' && typeof value === 'string') metadata.document_id = value;
    else if (key === 'chunk_index' && typeof value === 'number') metadata.chunk_index = value;
    else if (key === 'ingested_at' && typeof value === 'string') metadata.ingested_at = value;
    else if (key === 'extra' && typeof value === 'object' && value !== null && !Array.isArray(value)) {
      for (const [extraKey, extraValue] of Object.entries(value)) {
        if (isScalar(extraValue)) extra[extraKey] = extraValue;
      }
    } else if (isScalar(value)) extra[key] = value;
  }

  if (Object.keys(extra).length > 0) metadata.extra = extra;
  return metadata;
}

/**
 * Flat form written to storage: typed keys plus the extra entries.
 */
export function flattenMetadata(metadata: ChunkMetadata): Record<string, MetadataScalar> {
  const { extra, ...known } = metadata;
  const flat: Record<string, MetadataScalar> = { ...(extra ?? {}) };
  for (const [key, value] of Object.entries(known)) {
    if (value !== undefined) flat[key] = value;
  }
  return flat;
}
