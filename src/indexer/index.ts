/**
 * Indexer Module
 *
 * Repository ingestion: walk → extract chunks → records → split → embed.
 *
 * Usage:
 * ```typescript
 * import { loadRepository, splitRecords } from './indexer/index.js';
 *
 * const { records } = await loadRepository('/path/to/repo', { extensions: ['py'] });
 * const pieces = await splitRecords(records, { chunkSize: 2000, chunkOverlap: 200 });
 * ```
 */

export { loadRepository, decodeContent } from './loader.js';
export { sanitizeValue, sanitizeMetadata, toChunkRecord } from './sanitize.js';
export { createIgnoreFilter, isBinaryFile, sniffBinary } from './ignore.js';
export {
  runIndexPipeline,
  IndexingCancelledError,
  type IndexingStage,
  type IndexPipelineOptions,
  type IndexPipelineResult,
  type StageStats,
} from './pipeline.js';

export {
  EXCLUDED_DIRECTORIES,
  BINARY_EXTENSIONS,
  BINARY_SNIFF_BYTES,
  type ChunkRecord,
  type LoadOptions,
  type LoadResult,
  type LoadStats,
  type MetadataValue,
  type RecordMetadata,
} from './types.js';

export * from './chunker/index.js';
export * from './embedder/index.js';
