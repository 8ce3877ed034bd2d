/**
 * Search Module
 *
 * SQLite-backed vector search over embedded chunks.
 */

export { ChunkStore, cosineSimilarity } from './store.js';
export { VectorIndex } from './vector-index.js';
export {
  formatSearchResults,
  formatHit,
  formatConfidence,
  hitSource,
  NO_RESULTS_MESSAGE,
} from './formatter.js';
export type { SearchHit, SimilaritySearcher } from './types.js';
