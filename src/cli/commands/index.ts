/**
 * Index Command
 *
 * Builds the vector index for a repository.
 *
 * Usage:
 *   cbi index                     Index repository.path from config.toml
 *   cbi index ./my-repo           Index a directory
 *   cbi index . -e py,ts          Only Python and TypeScript files
 *   cbi index . --dry-run         Count files and chunks, embed nothing
 *   cbi index . --force           Replace an existing index
 *   cbi index . --json            Output progress as NDJSON
 *
 * The indexing pipeline:
 * 1. Loading   - Walk the repository and extract code chunks
 * 2. Splitting - Cut oversize chunks to the configured budget
 * 3. Embedding - Compute vector embeddings for each chunk
 * 4. Storing   - Replace the SQLite chunk store contents
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { existsSync, statSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { validateInput, IndexOptionsSchema } from '../validation.js';
import {
  runIndexPipeline,
  type IndexPipelineOptions,
  type IndexPipelineResult,
} from '../../indexer/pipeline.js';
import { createEmbeddingProvider } from '../../indexer/embedder/provider.js';
import { loadConfig, resolveStoragePath } from '../../config/loader.js';
import { openDatabase } from '../../database/connection.js';
import { ChunkStore } from '../../search/store.js';
import { VectorIndex } from '../../search/vector-index.js';
import { CLIError, FileNotFoundError, ValidationError } from '../../errors/index.js';

/**
 * Command-specific options, as commander hands them over.
 */
interface IndexCommandOptions {
  extensions?: string;
  dryRun?: boolean;
  force?: boolean;
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .argument('[path]', 'Repository to index (default: repository.path from config)')
    .description('Index a repository for code search and questions')
    .option('-e, --extensions <list>', 'Comma-separated extensions to include (e.g. py,ts)')
    .option('--dry-run', 'Load and split only; print counts without embedding', false)
    .option('--force', 'Replace an existing index', false)
    .action(async (path: string | undefined, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();

      const validated = validateInput(IndexOptionsSchema, cmdOptions);
      if (!validated.success) {
        throw new ValidationError(validated.error);
      }
      const options = validated.data;

      const config = loadConfig();
      const repoPath = resolve(path ?? config.repository.path);

      if (!existsSync(repoPath)) {
        throw new FileNotFoundError(repoPath);
      }
      if (!statSync(repoPath).isDirectory()) {
        throw new CLIError(
          `Path is not a directory: ${repoPath}`,
          'cbi index requires a directory path, not a file'
        );
      }

      const configured = config.repository.include_extensions;
      const extensions = options.extensions ?? (configured.length > 0 ? configured : undefined);

      ctx.debug(`Indexing path: ${repoPath}`);
      if (extensions) ctx.debug(`Extensions: ${extensions.join(', ')}`);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });

      const pipelineOptions: IndexPipelineOptions = {
        repoPath,
        extensions,
        splitter: {
          chunkSize: config.chunking.chunk_size,
          chunkOverlap: config.chunking.chunk_overlap,
        },
        embeddingBatchSize: config.embedding.batch_size,
        onStageStart: (stage, total) => reporter.startStage(stage, total),
        onProgress: (_stage, processed) => reporter.updateProgress(processed),
        onStageComplete: (_stage, stats) => reporter.completeStage(stats),
        onWarning: (message) => reporter.warn(message),
      };

      if (options.dryRun) {
        reporter.showSummary(await runIndexPipeline({ ...pipelineOptions, dryRun: true }));
        return;
      }

      const dbPath = resolveStoragePath(config);
      const store = new ChunkStore(openDatabase(dbPath));
      const existing = store.count();

      if (existing > 0 && !options.force) {
        throw new CLIError(
          `Index already exists (${existing} chunks in ${dbPath})`,
          'Use --force to rebuild it'
        );
      }
      if (existing > 0) {
        ctx.debug(`Re-indexing: replacing ${existing} existing chunks`);
      }

      const provider = createEmbeddingProvider(config.embedding);
      ctx.debug(`Embedding model: ${provider.model}`);

      let result: IndexPipelineResult;
      try {
        result = await runIndexPipeline({
          ...pipelineOptions,
          index: new VectorIndex(store, provider),
        });
      } catch (error) {
        if (error instanceof CLIError) throw error;
        throw new CLIError(
          `Indexing failed: ${error instanceof Error ? error.message : String(error)}`,
          'Check the error details above and try again'
        );
      }

      reporter.showSummary(result);
    });
}
