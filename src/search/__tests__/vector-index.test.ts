/**
 * VectorIndex Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { ChunkStore } from '../store.js';
import { VectorIndex } from '../vector-index.js';
import { IN_MEMORY, openDatabase } from '../../database/index.js';
import type { ChunkRecord } from '../../indexer/types.js';
import { KeywordEmbeddingProvider } from '../../test-utils/index.js';

const RECORDS: ChunkRecord[] = [
  { text: 'def login(user):\n    return check(user)', metadata: { name: 'login' } },
  { text: 'def parse(raw):\n    return raw.split()', metadata: { name: 'parse' } },
  { text: '# Demo project', metadata: { name: 'README' } },
];

describe('VectorIndex', () => {
  let index: VectorIndex;

  beforeEach(() => {
    index = new VectorIndex(
      new ChunkStore(openDatabase(IN_MEMORY)),
      new KeywordEmbeddingProvider(['login', 'parse'])
    );
  });

  it('should embed and store records on rebuild', async () => {
    const stored = await index.rebuild(RECORDS);

    expect(stored).toBe(3);
    expect(index.count()).toBe(3);
    expect(index.store.getMeta('embedding_model')).toBe('keyword-test');
    expect(index.store.getMeta('embedding_dimensions')).toBe('3');
    expect(index.store.getMeta('built_at')).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('should replace previous contents', async () => {
    await index.rebuild(RECORDS);
    await index.rebuild(RECORDS.slice(0, 1));

    expect(index.count()).toBe(1);
  });

  it('should rank records by similarity to the query text', async () => {
    await index.rebuild(RECORDS);

    const hits = await index.similaritySearch('login flow', 3);

    expect(hits.map((h) => h.record.metadata.name)).toEqual(['login', 'README', 'parse']);
    expect(hits[0]?.score).toBeCloseTo(0);
    expect(hits[2]?.score).toBeCloseTo(0.5);
  });

  it('should record zero dimensions for an empty index', () => {
    expect(index.replace([])).toBe(0);
    expect(index.store.getMeta('embedding_dimensions')).toBe('0');
  });
});
