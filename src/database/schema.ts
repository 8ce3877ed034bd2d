/**
 * Database Schema Types
 *
 * TypeScript shapes of the SQLite tables, plus embedding BLOB conversion.
 */

// ============================================================================
// chunks
// ============================================================================

/**
 * A stored chunk with its embedding.
 */
export interface Chunk {
  /** UUID primary key */
  id: string;
  content: string;
  /** Float32Array bytes */
  embedding: Buffer;
  /** JSON object of flat record metadata */
  metadata: string;
  /** SQLite datetime('now') */
  created_at: string;
}

// ============================================================================
// index_meta
// ============================================================================

/** Keys written to index_meta */
export type IndexMetaKey = 'embedding_model' | 'embedding_dimensions' | 'built_at' | 'repo_path';

export interface IndexMeta {
  key: string;
  value: string;
}

// ============================================================================
// Embedding BLOB conversion
// ============================================================================

/**
 * Float32Array → Buffer for a BLOB column. Respects the view's offset, so
 * subarrays are stored correctly.
 *
 * @example
 * ```ts
 * db.prepare('INSERT INTO chunks (embedding) VALUES (?)').run(embeddingToBlob(vector));
 * ```
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Buffer from a BLOB column → Float32Array. Copies, because better-sqlite3
 * buffers are not guaranteed to be 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(blob.byteLength / 4));
}
