/**
 * Embedder Module
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider, embedRecords } from './embedder/index.js';
 *
 * const provider = createEmbeddingProvider(config.embedding);
 * const embedded = await embedRecords(records, provider, { batchSize: 64 });
 * ```
 */

export { embedRecords, EmbeddingTimeoutError } from './embedder.js';
export { createEmbeddingProvider, OpenAIEmbeddingProvider, type OpenAIEmbeddingOptions } from './provider.js';
export type { EmbeddingProvider, EmbeddingConfig, EmbeddedRecord, EmbedderOptions } from './types.js';
