/**
 * Repository Loader
 *
 * Walks a repository with fast-glob, skips excluded and binary files,
 * decodes the rest and turns every file into chunk records via the
 * dispatcher. Files are processed one at a time; a file that cannot be read
 * is skipped and the walk goes on.
 */

import { existsSync, statSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname, relative, resolve } from 'node:path';
import fg from 'fast-glob';

import { consoleLogger, type Logger } from '../utils/logger.js';
import { createFileChunk } from './chunker/chunk-factory.js';
import { parseFile } from './chunker/dispatcher.js';
import type { CodeChunk } from './chunker/types.js';
import { createIgnoreFilter, isBinaryFile, sniffBinary } from './ignore.js';
import { toChunkRecord } from './sanitize.js';
import type { ChunkRecord, LoadOptions, LoadResult, LoadStats } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode file bytes: strict UTF-8 first, Latin-1 when that fails.
 */
export function decodeContent(buffer: Buffer): string {
  try {
    return utf8.decode(buffer);
  } catch {
    return buffer.toString('latin1');
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse a file, falling back to one whole-file chunk if the parser throws.
 */
function chunkFile(
  filePath: string,
  content: string,
  repoRoot: string,
  logger: Logger
): CodeChunk[] {
  try {
    return parseFile(filePath, content, repoRoot);
  } catch (error) {
    logger.warn(`Parser failed for ${filePath}, indexing as one chunk: ${errorMessage(error)}`);
    return [createFileChunk(filePath, content, repoRoot)];
  }
}

/**
 * Load every eligible file under `repoRoot` as chunk records.
 *
 * @example
 * ```ts
 * const { records, stats } = await loadRepository('/path/to/repo', {
 *   extensions: ['py', 'ts'],
 * });
 * console.log(`${stats.filesLoaded} files → ${stats.chunkCount} chunks`);
 * ```
 */
export async function loadRepository(
  repoRoot: string,
  options: LoadOptions = {}
): Promise<LoadResult> {
  const logger = options.logger ?? consoleLogger;
  const now = options.now ?? (() => new Date());
  const absoluteRoot = resolve(repoRoot);

  const stats: LoadStats = {
    filesVisited: 0,
    filesLoaded: 0,
    filesSkipped: 0,
    chunkCount: 0,
  };
  const records: ChunkRecord[] = [];

  if (!existsSync(absoluteRoot) || !statSync(absoluteRoot).isDirectory()) {
    logger.warn(`Repository path does not exist or is not a directory: ${absoluteRoot}`);
    return { records, stats };
  }

  const allowed = options.extensions
    ? new Set(options.extensions.map((ext) => ext.replace(/^\./, '').toLowerCase()))
    : null;
  const shouldSkip = createIgnoreFilter({ rootPath: absoluteRoot });
  const loadedAt = now();

  const entries = await fg('**/*', {
    cwd: absoluteRoot,
    absolute: true,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });
  entries.sort();

  for (const filePath of entries) {
    stats.filesVisited++;
    const rel = relative(absoluteRoot, filePath);

    if (shouldSkip(rel) || isBinaryFile(filePath)) {
      stats.filesSkipped++;
      continue;
    }

    const ext = extname(filePath).slice(1).toLowerCase();
    if (allowed && !allowed.has(ext)) {
      stats.filesSkipped++;
      continue;
    }

    try {
      if (await sniffBinary(filePath)) {
        logger.debug?.(`Skipping binary file: ${rel}`);
        stats.filesSkipped++;
        continue;
      }
    } catch (error) {
      logger.debug?.(`Cannot open ${rel}: ${errorMessage(error)}`);
      stats.filesSkipped++;
      continue;
    }

    let content: string;
    try {
      content = decodeContent(await readFile(filePath));
    } catch (error) {
      logger.warn(`Skipping unreadable file ${rel}: ${errorMessage(error)}`);
      stats.filesSkipped++;
      continue;
    }

    const chunks = chunkFile(filePath, content, absoluteRoot, logger);
    for (const chunk of chunks) {
      records.push(toChunkRecord(chunk, { repoRoot: absoluteRoot, loadedAt }));
    }

    stats.filesLoaded++;
    stats.chunkCount += chunks.length;
    logger.debug?.(`${rel}: ${chunks.length} chunk(s)`);
  }

  return { records, stats };
}
