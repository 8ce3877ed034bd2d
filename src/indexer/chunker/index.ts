/**
 * Chunker Module
 *
 * Code-aware chunking:
 * - Python → parse-tree walk (functions, classes, methods)
 * - JavaScript/TypeScript → anchored patterns + brace matching
 * - Java/Kotlin → type declarations + brace matching
 * - Everything else → one chunk per file
 *
 * Usage:
 * ```typescript
 * import { parseFile } from './chunker/index.js';
 *
 * const chunks = parseFile('/repo/src/server.ts', source, '/repo');
 * ```
 */

export { parseFile, getExtractorKind, EXTENSION_TO_EXTRACTOR } from './dispatcher.js';
export { findBlockEnd } from './boundary.js';
export { resolveProject } from './project-context.js';
export { createFileChunk, languageOf, fileStem } from './chunk-factory.js';
export { splitRecords, DEFAULT_SPLITTER_CONFIG, SPLIT_SEPARATORS, type SplitterConfig } from './splitter.js';
export { EXTRACTORS } from './extractors/index.js';

export type {
  ChunkKind,
  CodeChunk,
  Extractor,
  ExtractorKind,
  ProjectContext,
} from './types.js';
