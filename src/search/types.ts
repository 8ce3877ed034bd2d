/**
 * Search Module Types
 */

import type { ChunkRecord } from '../indexer/types.js';

/**
 * A stored record matched by a similarity search.
 */
export interface SearchHit {
  /** Chunk UUID */
  id: string;

  record: ChunkRecord;

  /**
   * Cosine distance: 1 − cosine similarity. 0 is identical, lower is
   * closer. Hits are ordered by ascending score.
   */
  score: number;
}

/**
 * Anything the search_codebase tool can query.
 */
export interface SimilaritySearcher {
  similaritySearch(query: string, k: number): Promise<SearchHit[]>;
}
