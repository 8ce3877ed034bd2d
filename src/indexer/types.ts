/**
 * Ingestion Types
 *
 * Type definitions for loading a repository into flat, storable records.
 */

import type { Logger } from '../utils/logger.js';

/**
 * Value allowed in record metadata. Vector stores only keep flat
 * primitive metadata, so nested values are serialized before they get here.
 */
export type MetadataValue = string | number | boolean | null;

export type RecordMetadata = Record<string, MetadataValue>;

/**
 * A chunk ready for embedding: its text plus flat metadata.
 *
 * Metadata keys written by the loader: source_path, kind, name, members,
 * start_line, end_line, language, project_name, project_relative_path,
 * repo_relative_path, repo_root_path, load_timestamp, character_count.
 * The splitter adds split_index and split_count to pieces it creates.
 */
export interface ChunkRecord {
  text: string;
  metadata: RecordMetadata;
}

/**
 * Options for loading a repository.
 */
export interface LoadOptions {
  /**
   * Only load files with these extensions (lowercase, without dot).
   * All non-binary files are loaded when omitted.
   * @example ['py', 'ts']
   */
  extensions?: string[];

  /** Receives skip warnings and per-file debug output */
  logger?: Logger;

  /** Clock for `load_timestamp` */
  now?: () => Date;
}

/**
 * Counters for a completed load.
 */
export interface LoadStats {
  /** Files returned by the directory walk */
  filesVisited: number;

  /** Files read and chunked */
  filesLoaded: number;

  /** Files excluded (directory, binary, extension) or unreadable */
  filesSkipped: number;

  /** Records produced */
  chunkCount: number;
}

export interface LoadResult {
  records: ChunkRecord[];
  stats: LoadStats;
}

/**
 * Directories never descended into, matched as a path segment at any depth.
 */
export const EXCLUDED_DIRECTORIES = [
  // Version control
  '.git',
  '.svn',
  '.hg',

  // Dependencies and environments
  'node_modules',
  '__pycache__',
  '.venv',
  'venv',
  '.tox',
  '.mypy_cache',
  '.pytest_cache',

  // Build outputs
  'dist',
  'build',
  '.next',
  '.cache',
  'coverage',
] as const;

/**
 * Extensions treated as binary without reading the file.
 */
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  // Images
  'png',
  'jpg',
  'jpeg',
  'gif',
  'bmp',
  'ico',
  'webp',
  // Compiled
  'exe',
  'dll',
  'so',
  'dylib',
  'pyc',
  'pyo',
  'class',
  'jar',
  'war',
  'wasm',
  // Archives
  'zip',
  'tar',
  'gz',
  'bz2',
  'xz',
  '7z',
  // Fonts
  'woff',
  'woff2',
  'ttf',
  'otf',
  // Documents and data
  'pdf',
  'db',
  'sqlite',
]);

/** Bytes read from the start of a file to detect binary content */
export const BINARY_SNIFF_BYTES = 2048;
