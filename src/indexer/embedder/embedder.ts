/**
 * Embedder Orchestration
 *
 * Turns ChunkRecord[] into EmbeddedRecord[]:
 * 1. Batch records (default: 64 per provider call)
 * 2. Convert provider vectors to Float32Array for BLOB storage
 * 3. On a failed batch, retry its records one by one and skip the bad ones
 * 4. Report progress after every batch
 */

import type { ChunkRecord } from '../types.js';
import type { EmbeddedRecord, EmbedderOptions, EmbeddingProvider } from './types.js';

const DEFAULT_BATCH_SIZE = 64;

export class EmbeddingTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Embedding request timed out after ${timeoutMs}ms`);
    this.name = 'EmbeddingTimeoutError';
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Embed texts with an optional timeout.
 */
async function embedTexts(
  provider: EmbeddingProvider,
  texts: string[],
  timeout?: number
): Promise<Float32Array[]> {
  if (!timeout) {
    const vectors = await provider.embedBatch(texts);
    return vectors.map((vector) => new Float32Array(vector));
  }

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new EmbeddingTimeoutError(timeout)), timeout);
  });

  try {
    const vectors = await Promise.race([provider.embedBatch(texts), timeoutPromise]);
    return vectors.map((vector) => new Float32Array(vector));
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Compute embeddings for records in batches.
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider(config.embedding);
 * const embedded = await embedRecords(records, provider, {
 *   batchSize: 64,
 *   onProgress: (done, total) => console.log(`${done}/${total}`),
 * });
 * ```
 */
export async function embedRecords(
  records: readonly ChunkRecord[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<EmbeddedRecord[]> {
  const { batchSize = DEFAULT_BATCH_SIZE, timeout, signal, onProgress, onError } = options;

  const embedded: EmbeddedRecord[] = [];
  let processed = 0;

  for (let start = 0; start < records.length; start += batchSize) {
    if (signal?.aborted) break;

    const batch = records.slice(start, start + batchSize);

    try {
      const vectors = await embedTexts(
        provider,
        batch.map((record) => record.text),
        timeout
      );

      batch.forEach((record, offset) => {
        const embedding = vectors[offset];
        if (!embedding || embedding.length === 0) {
          onError?.(new Error('Empty embedding returned'), start + offset);
          return;
        }
        embedded.push({ record, embedding });
      });

      processed += batch.length;
      onProgress?.(processed, records.length);
    } catch {
      // Isolate the failing record(s)
      for (const [offset, record] of batch.entries()) {
        if (signal?.aborted) break;

        try {
          const [embedding] = await embedTexts(provider, [record.text], timeout);
          if (embedding && embedding.length > 0) {
            embedded.push({ record, embedding });
          } else {
            onError?.(new Error('Empty embedding returned'), start + offset);
          }
        } catch (error) {
          onError?.(toError(error), start + offset);
        }

        processed++;
        onProgress?.(processed, records.length);
      }
    }
  }

  return embedded;
}
