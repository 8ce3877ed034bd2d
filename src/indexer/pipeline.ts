/**
 * Index Pipeline
 *
 * Orchestrates the complete indexing workflow:
 * Load → Split → Embed → Store
 *
 * It doesn't know HOW to display progress; the CLI's ProgressReporter
 * does. The pipeline fires callbacks at the right moments.
 *
 * - Each stage has start/progress/complete callbacks
 * - Non-fatal problems are collected as warnings, not thrown
 * - A dry run stops after splitting and touches no store
 */

import { resolve } from 'node:path';

import { splitRecords, type SplitterConfig } from './chunker/splitter.js';
import { embedRecords } from './embedder/embedder.js';
import type { EmbeddedRecord } from './embedder/types.js';
import { loadRepository } from './loader.js';
import type { ChunkRecord } from './types.js';
import type { VectorIndex } from '../search/vector-index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Stages in the indexing pipeline, in execution order.
 */
export type IndexingStage = 'loading' | 'splitting' | 'embedding' | 'storing';

/**
 * Statistics for a completed stage.
 */
export interface StageStats {
  stage: IndexingStage;

  /** Items the stage produced */
  processed: number;

  /** Items the stage received */
  total: number;

  durationMs: number;

  /** Stage-specific details */
  details?: Record<string, unknown>;
}

/**
 * Options for running the index pipeline.
 */
export interface IndexPipelineOptions {
  /** Repository root to index */
  repoPath: string;

  /** Extension allow-list (lowercase, no dot) */
  extensions?: string[];

  /** Secondary splitter budget */
  splitter?: Partial<SplitterConfig>;

  /** Target index; required unless dryRun */
  index?: VectorIndex;

  /** Records per embedding request. Default: 64 */
  embeddingBatchSize?: number;

  /** Stop after splitting */
  dryRun?: boolean;

  /** Stop between embedding batches */
  signal?: AbortSignal;

  onStageStart?: (stage: IndexingStage, total: number) => void;
  onProgress?: (stage: IndexingStage, processed: number, total: number) => void;
  onStageComplete?: (stage: IndexingStage, stats: StageStats) => void;
  onWarning?: (message: string) => void;
}

/**
 * Final result of the indexing pipeline.
 */
export interface IndexPipelineResult {
  repoPath: string;
  filesVisited: number;
  filesLoaded: number;
  filesSkipped: number;

  /** Records produced by the extractors */
  chunksLoaded: number;

  /** Records after the secondary split */
  chunksSplit: number;

  /** 0 on a dry run */
  chunksStored: number;

  /** Records per chunk kind, after splitting */
  byKind: Record<string, number>;

  totalDurationMs: number;
  stageDurations: Partial<Record<IndexingStage, number>>;
  warnings: string[];
  dryRun: boolean;
}

/**
 * Error thrown when indexing is cancelled via AbortSignal.
 */
export class IndexingCancelledError extends Error {
  constructor() {
    super('Indexing cancelled');
    this.name = 'IndexingCancelledError';
  }
}

function checkCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new IndexingCancelledError();
  }
}

function countByKind(records: readonly ChunkRecord[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of records) {
    const kind = String(record.metadata.kind ?? 'unknown');
    counts[kind] = (counts[kind] ?? 0) + 1;
  }
  return counts;
}

/**
 * Run the complete indexing pipeline.
 *
 * @example
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: true });
 * const result = await runIndexPipeline({
 *   repoPath: '/path/to/repo',
 *   index: new VectorIndex(store, provider),
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed) => reporter.updateProgress(processed),
 *   onStageComplete: (stage, stats) => reporter.completeStage(stats),
 *   onWarning: (msg) => reporter.warn(msg),
 * });
 * reporter.showSummary(result);
 * ```
 */
export async function runIndexPipeline(
  options: IndexPipelineOptions
): Promise<IndexPipelineResult> {
  const { repoPath, signal, onStageStart, onProgress, onStageComplete, onWarning } = options;
  const dryRun = options.dryRun ?? false;
  const repoRoot = resolve(repoPath);

  if (!dryRun && !options.index) {
    throw new Error('runIndexPipeline needs an index unless dryRun is set');
  }

  const pipelineStartTime = performance.now();
  const stageDurations: Partial<Record<IndexingStage, number>> = {};
  const warnings: string[] = [];

  const warn = (message: string): void => {
    warnings.push(message);
    onWarning?.(message);
  };
  const logger: Logger = {
    info: () => {},
    warn,
  };

  // =========================================================================
  // STAGE 1: LOADING
  // =========================================================================
  checkCancelled(signal);
  let stageStart = performance.now();
  onStageStart?.('loading', 0);

  const { records, stats } = await loadRepository(repoRoot, {
    extensions: options.extensions,
    logger,
  });

  stageDurations.loading = Math.round(performance.now() - stageStart);
  onStageComplete?.('loading', {
    stage: 'loading',
    processed: records.length,
    total: stats.filesVisited,
    durationMs: stageDurations.loading,
    details: {
      filesLoaded: stats.filesLoaded,
      filesSkipped: stats.filesSkipped,
    },
  });

  // =========================================================================
  // STAGE 2: SPLITTING
  // =========================================================================
  checkCancelled(signal);
  stageStart = performance.now();
  onStageStart?.('splitting', records.length);

  const split = await splitRecords(records, options.splitter);

  stageDurations.splitting = Math.round(performance.now() - stageStart);
  onStageComplete?.('splitting', {
    stage: 'splitting',
    processed: split.length,
    total: records.length,
    durationMs: stageDurations.splitting,
  });

  let chunksStored = 0;

  if (!dryRun && options.index) {
    const index = options.index;

    // =======================================================================
    // STAGE 3: EMBEDDING
    // =======================================================================
    checkCancelled(signal);
    stageStart = performance.now();
    onStageStart?.('embedding', split.length);

    const embedded: EmbeddedRecord[] = await embedRecords(split, index.provider, {
      batchSize: options.embeddingBatchSize,
      signal,
      onProgress: (processed, total) => onProgress?.('embedding', processed, total),
      onError: (error, i) => warn(`Embedding failed for record ${i}: ${error.message}`),
    });

    stageDurations.embedding = Math.round(performance.now() - stageStart);
    onStageComplete?.('embedding', {
      stage: 'embedding',
      processed: embedded.length,
      total: split.length,
      durationMs: stageDurations.embedding,
    });

    // =======================================================================
    // STAGE 4: STORING
    // =======================================================================
    checkCancelled(signal);
    stageStart = performance.now();
    onStageStart?.('storing', embedded.length);

    chunksStored = index.replace(embedded);
    index.store.setMeta('repo_path', repoRoot);

    stageDurations.storing = Math.round(performance.now() - stageStart);
    onStageComplete?.('storing', {
      stage: 'storing',
      processed: chunksStored,
      total: embedded.length,
      durationMs: stageDurations.storing,
    });
  }

  return {
    repoPath: repoRoot,
    filesVisited: stats.filesVisited,
    filesLoaded: stats.filesLoaded,
    filesSkipped: stats.filesSkipped,
    chunksLoaded: records.length,
    chunksSplit: split.length,
    chunksStored,
    byKind: countByKind(split),
    totalDurationMs: Math.round(performance.now() - pipelineStartTime),
    stageDurations,
    warnings,
    dryRun,
  };
}
