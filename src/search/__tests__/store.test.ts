/**
 * ChunkStore Tests
 *
 * Exercises the SQLite store against a private in-memory database.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { ChunkStore, cosineSimilarity } from '../store.js';
import { IN_MEMORY, openDatabase } from '../../database/index.js';
import { DatabaseError } from '../../errors/index.js';
import type { EmbeddedRecord } from '../../indexer/embedder/types.js';

function embedded(text: string, vector: number[]): EmbeddedRecord {
  return {
    record: { text, metadata: { name: text, start_line: 0, exported: true, project_name: null } },
    embedding: new Float32Array(vector),
  };
}

describe('cosineSimilarity', () => {
  it('should be 1 for parallel vectors', () => {
    expect(cosineSimilarity(new Float32Array([1, 2]), new Float32Array([2, 4]))).toBeCloseTo(1);
  });

  it('should be 0 for orthogonal and zero vectors', () => {
    expect(cosineSimilarity(new Float32Array([1, 0]), new Float32Array([0, 1]))).toBe(0);
    expect(cosineSimilarity(new Float32Array([0, 0]), new Float32Array([1, 1]))).toBe(0);
  });
});

describe('ChunkStore', () => {
  let store: ChunkStore;

  beforeEach(() => {
    store = new ChunkStore(openDatabase(IN_MEMORY));
  });

  describe('add / count', () => {
    it('should insert records and return their ids', () => {
      const ids = store.add([embedded('a', [1, 0]), embedded('b', [0, 1])]);

      expect(ids).toHaveLength(2);
      expect(new Set(ids).size).toBe(2);
      expect(store.count()).toBe(2);
    });

    it('should start empty', () => {
      expect(store.count()).toBe(0);
    });
  });

  describe('searchByVector', () => {
    beforeEach(() => {
      store.add([embedded('a', [1, 0]), embedded('b', [0, 1]), embedded('c', [1, 1])]);
    });

    it('should return the closest records first', () => {
      const hits = store.searchByVector(new Float32Array([1, 0]), 2);

      expect(hits.map((h) => h.record.text)).toEqual(['a', 'c']);
      expect(hits[0]?.score).toBeCloseTo(0);
      expect(hits[1]?.score).toBeCloseTo(1 - Math.SQRT1_2);
    });

    it('should round-trip metadata', () => {
      const [hit] = store.searchByVector(new Float32Array([0, 1]), 1);
      expect(hit?.record.metadata).toEqual({
        name: 'b',
        start_line: 0,
        exported: true,
        project_name: null,
      });
    });

    it('should keep insertion order for equal scores', () => {
      store.add([embedded('a2', [2, 0])]);
      const hits = store.searchByVector(new Float32Array([1, 0]), 2);
      expect(hits.map((h) => h.record.text)).toEqual(['a', 'a2']);
    });

    it('should return nothing for k <= 0', () => {
      expect(store.searchByVector(new Float32Array([1, 0]), 0)).toEqual([]);
    });

    it('should reject a query of another dimension', () => {
      expect(() => store.searchByVector(new Float32Array([1, 0, 0]), 1)).toThrow(DatabaseError);
    });
  });

  describe('metadata', () => {
    it('should upsert values', () => {
      store.setMeta('embedding_model', 'first');
      store.setMeta('embedding_model', 'second');
      expect(store.getMeta('embedding_model')).toBe('second');
    });

    it('should return undefined for unset keys', () => {
      expect(store.getMeta('built_at')).toBeUndefined();
    });
  });

  describe('clear', () => {
    it('should remove chunks and metadata', () => {
      store.add([embedded('a', [1, 0])]);
      store.setMeta('repo_path', '/repo');

      store.clear();

      expect(store.count()).toBe(0);
      expect(store.getMeta('repo_path')).toBeUndefined();
    });
  });
});
