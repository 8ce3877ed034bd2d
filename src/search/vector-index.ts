/**
 * Vector Index
 *
 * Pairs the chunk store with an embedding provider: records go in as text,
 * queries come in as text.
 */

import { embedRecords } from '../indexer/embedder/embedder.js';
import type { EmbeddedRecord, EmbedderOptions, EmbeddingProvider } from '../indexer/embedder/types.js';
import type { ChunkRecord } from '../indexer/types.js';
import type { ChunkStore } from './store.js';
import type { SearchHit, SimilaritySearcher } from './types.js';

export class VectorIndex implements SimilaritySearcher {
  constructor(
    readonly store: ChunkStore,
    readonly provider: EmbeddingProvider
  ) {}

  /**
   * Replace the index contents with `records`.
   * @returns the number of records stored (failed embeddings are skipped)
   */
  async rebuild(records: readonly ChunkRecord[], options: EmbedderOptions = {}): Promise<number> {
    return this.replace(await embedRecords(records, this.provider, options));
  }

  /**
   * Replace the index contents with records embedded elsewhere.
   * @returns the number of records stored
   */
  replace(embedded: readonly EmbeddedRecord[]): number {
    const first = embedded[0];

    this.store.clear();
    this.store.add(embedded);
    this.store.setMeta('embedding_model', this.provider.model);
    this.store.setMeta('embedding_dimensions', String(first?.embedding.length ?? 0));
    this.store.setMeta('built_at', new Date().toISOString());

    return embedded.length;
  }

  count(): number {
    return this.store.count();
  }

  async similaritySearch(query: string, k: number): Promise<SearchHit[]> {
    const vector = new Float32Array(await this.provider.embed(query));
    return this.store.searchByVector(vector, k);
  }
}
