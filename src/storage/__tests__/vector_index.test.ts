/**
 * @fileoverview Contract tests shared by the SQLite and in-memory indexes
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from '../../core/errors.js';
import { openDatabase } from '../database.js';
import { InMemoryVectorIndex } from '../memory_vector_index.js';
import { SqliteVectorIndex } from '../sqlite_vector_index.js';
import type { VectorIndex, VectorRecord } from '../types.js';

function record(id: string, embedding: number[], documentId = 'doc-1'): VectorRecord {
  return {
    id,
    text: `text of ${id}`,
    embedding,
    metadata: { source: 'notes.txt', file_type: 'txt', document_id: documentId, chunk_index: 0 },
  };
}

const FACTORIES: Array<[string, () => VectorIndex]> = [
  ['SqliteVectorIndex', () => new SqliteVectorIndex(openDatabase(':memory:'), { ownsConnection: true })],
  ['InMemoryVectorIndex', () => new InMemoryVectorIndex()],
];

describe.each(FACTORIES)('%s', (_name, create) => {
  let index: VectorIndex;

  beforeEach(() => {
    index = create();
  });

  afterEach(() => {
    index.close();
  });

  it('returns nothing from an empty index', async () => {
    expect(await index.query([1, 0, 0], 5)).toEqual([]);
    expect(await index.count()).toBe(0);
  });

  it('returns the ids it was given in input order', async () => {
    const ids = await index.add([record('b', [0, 1, 0]), record('a', [1, 0, 0])]);
    expect(ids).toEqual(['b', 'a']);
    expect(await index.count()).toBe(2);
  });

  it('orders hits closest first and truncates to k', async () => {
    await index.add([
      record('far', [0, 1, 0]),
      record('near', [1, 0, 0]),
      record('middle', [1, 1, 0]),
    ]);

    const hits = await index.query([1, 0, 0], 2);

    expect(hits.map((hit) => hit.id)).toEqual(['near', 'middle']);
    expect(hits[0].distance).toBeCloseTo(0, 6);
    expect(hits[1].distance).toBeCloseTo(1 - Math.SQRT1_2, 6);
  });

  it('returns no hits for k <= 0', async () => {
    await index.add([record('a', [1, 0, 0])]);
    expect(await index.query([1, 0, 0], 0)).toEqual([]);
  });

  it('round-trips text and metadata', async () => {
    await index.add([
      {
        id: 'x',
        text: 'Quarterly numbers',
        embedding: [0, 0, 1],
        metadata: { source: 'q3.csv', file_type: 'csv', document_id: 'doc-9', chunk_index: 4, extra: { region: 'EU' } },
      },
    ]);

    const [hit] = await index.query([0, 0, 1], 1);

    expect(hit.text).toBe('Quarterly numbers');
    expect(hit.metadata).toEqual({
      source: 'q3.csv',
      file_type: 'csv',
      document_id: 'doc-9',
      chunk_index: 4,
      extra: { region: 'EU' },
    });
  });

  it('replaces a record re-added under the same id', async () => {
    await index.add([record('a', [1, 0, 0])]);
    await index.add([{ ...record('a', [0, 1, 0]), text: 'updated' }]);

    expect(await index.count()).toBe(1);
    const [stored] = await index.get(['a']);
    expect(stored.text).toBe('updated');
  });

  it('rejects embeddings whose dimension differs from the index', async () => {
    await index.add([record('a', [1, 0, 0])]);

    await expect(index.add([record('b', [1, 0])])).rejects.toBeInstanceOf(StorageError);
    await expect(index.query([1, 0], 1)).rejects.toThrow('query has 2 dimensions, index uses 3');
  });

  it('gets only existing ids, in the order requested', async () => {
    await index.add([record('a', [1, 0, 0]), record('b', [0, 1, 0])]);

    const found = await index.get(['b', 'missing', 'a']);

    expect(found.map((chunk) => chunk.id)).toEqual(['b', 'a']);
  });

  it('lists and deletes the chunks of one document', async () => {
    await index.add([
      record('a-0', [1, 0, 0], 'doc-a'),
      record('b-0', [0, 1, 0], 'doc-b'),
      record('a-1', [0, 0, 1], 'doc-a'),
    ]);

    const ids = await index.idsForDocument('doc-a');
    expect(ids).toEqual(['a-0', 'a-1']);

    await index.delete(ids);

    expect(await index.count()).toBe(1);
    expect(await index.idsForDocument('doc-a')).toEqual([]);
    expect(await index.get(['b-0'])).toHaveLength(1);
  });
});

describe('InMemoryVectorIndex metrics', () => {
  it('ranks by euclidean distance under l2', async () => {
    const index = new InMemoryVectorIndex('l2');
    await index.add([record('long', [10, 0]), record('short', [1, 0])]);

    const hits = await index.query([2, 0], 2);

    expect(hits.map((hit) => hit.id)).toEqual(['short', 'long']);
    expect(hits[0].distance).toBe(1);
    expect(hits[1].distance).toBe(8);
  });

  it('ranks larger dot products first under inner_product', async () => {
    const index = new InMemoryVectorIndex('inner_product');
    await index.add([record('small', [1, 0]), record('large', [3, 0])]);

    const hits = await index.query([1, 0], 2);

    expect(hits.map((hit) => hit.id)).toEqual(['large', 'small']);
    expect(hits[0].distance).toBe(-3);
  });
});

describe('SqliteVectorIndex persistence', () => {
  it('shares data across index instances on one connection', async () => {
    const db = openDatabase(':memory:');
    const writer = new SqliteVectorIndex(db);
    await writer.add([record('a', [1, 0, 0])]);

    const reader = new SqliteVectorIndex(db);
    expect(await reader.count()).toBe(1);

    writer.close();
    expect(db.open).toBe(true);
    db.close();
  });

  it('closes the connection it owns', () => {
    const db = openDatabase(':memory:');
    const index = new SqliteVectorIndex(db, { ownsConnection: true });
    index.close();
    expect(db.open).toBe(false);
  });
});
