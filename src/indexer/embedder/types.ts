/**
 * Embedder Types
 *
 * Providers return plain `number[]` vectors; records carry them as
 * Float32Array so they can be written straight into SQLite BLOBs.
 */

import type { ChunkRecord } from '../types.js';

/**
 * Anything that turns text into vectors.
 */
export interface EmbeddingProvider {
  /** Model identifier, recorded alongside the index */
  readonly model: string;

  embed(text: string): Promise<number[]>;

  /** Embed several texts; results are in input order */
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Matches the [embedding] section of config.toml.
 */
export interface EmbeddingConfig {
  provider: 'openai';
  model: string;
  batch_size: number;
}

/**
 * A record with its embedding, ready for the chunk store.
 */
export interface EmbeddedRecord {
  record: ChunkRecord;
  embedding: Float32Array;
}

export interface EmbedderOptions {
  /**
   * Records per provider call.
   * @default 64
   */
  batchSize?: number;

  /** Abort a batch that takes longer than this many milliseconds */
  timeout?: number;

  /** Stop between batches; records embedded so far are returned */
  signal?: AbortSignal;

  /** Fired after each batch */
  onProgress?: (processed: number, total: number) => void;

  /** A record was skipped; embedding continues */
  onError?: (error: Error, index: number) => void;
}
