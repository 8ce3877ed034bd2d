/**
 * Chunk Store
 *
 * Embedded records in SQLite (better-sqlite3). Vectors are Float32 BLOBs;
 * search is an exact cosine scan over every row, which keeps the store
 * dependency-free and is fast enough for a single repository.
 */

import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import { z } from 'zod';

import {
  blobToEmbedding,
  ChunkRowSchema,
  embeddingToBlob,
  IndexMetaRowSchema,
  validateRows,
  type IndexMetaKey,
} from '../database/index.js';
import { DatabaseError } from '../errors/index.js';
import type { EmbeddedRecord } from '../indexer/embedder/types.js';
import type { RecordMetadata } from '../indexer/types.js';
import { safeJsonParse } from '../utils/json.js';
import type { SearchHit } from './types.js';

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

/**
 * Cosine similarity of two equal-length vectors. Zero vectors have
 * similarity 0 with everything.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class ChunkStore {
  constructor(private readonly db: Database.Database) {}

  /**
   * Insert embedded records in one transaction.
   * @returns the generated chunk ids, in input order
   */
  add(items: readonly EmbeddedRecord[]): string[] {
    const insert = this.db.prepare(
      'INSERT INTO chunks (id, content, embedding, metadata) VALUES (?, ?, ?, ?)'
    );
    const ids: string[] = [];

    try {
      this.db.transaction(() => {
        for (const { record, embedding } of items) {
          const id = randomUUID();
          insert.run(id, record.text, embeddingToBlob(embedding), JSON.stringify(record.metadata));
          ids.push(id);
        }
      })();
    } catch (error) {
      throw new DatabaseError('Failed to store chunks', error instanceof Error ? error : undefined);
    }

    return ids;
  }

  count(): number {
    const value: unknown = this.db.prepare('SELECT COUNT(*) FROM chunks').pluck().get();
    return typeof value === 'number' ? value : 0;
  }

  /**
   * Remove every chunk and all index metadata.
   */
  clear(): void {
    this.db.transaction(() => {
      this.db.exec('DELETE FROM chunks');
      this.db.exec('DELETE FROM index_meta');
    })();
  }

  /**
   * The `k` stored records closest to `vector`, closest first.
   *
   * @throws DatabaseError if stored vectors have a different dimension
   */
  searchByVector(vector: Float32Array, k: number): SearchHit[] {
    if (k <= 0) return [];

    const rows = validateRows(
      ChunkRowSchema,
      this.db.prepare('SELECT id, content, embedding, metadata, created_at FROM chunks ORDER BY rowid').all(),
      'chunks'
    );

    const hits: SearchHit[] = [];
    for (const row of rows) {
      const embedding = blobToEmbedding(row.embedding);
      if (embedding.length !== vector.length) {
        throw new DatabaseError(
          `Embedding dimension mismatch: index has ${embedding.length}, query has ${vector.length}`
        );
      }

      const metadata: RecordMetadata = safeJsonParse(row.metadata, MetadataSchema, {});
      hits.push({
        id: row.id,
        record: { text: row.content, metadata },
        score: 1 - cosineSimilarity(vector, embedding),
      });
    }

    // Array.prototype.sort is stable: equal scores keep insertion order
    hits.sort((a, b) => a.score - b.score);
    return hits.slice(0, k);
  }

  getMeta(key: IndexMetaKey): string | undefined {
    const rows = validateRows(
      IndexMetaRowSchema,
      this.db.prepare('SELECT key, value FROM index_meta WHERE key = ?').all(key),
      'index_meta'
    );
    return rows[0]?.value;
  }

  setMeta(key: IndexMetaKey, value: string): void {
    this.db
      .prepare(
        'INSERT INTO index_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
      )
      .run(key, value);
  }
}
