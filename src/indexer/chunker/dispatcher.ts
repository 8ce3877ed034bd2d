/**
 * Dispatcher
 *
 * Single entry point of code-aware parsing: picks the extractor for a file
 * from its extension and guarantees at least one chunk per file.
 */

import { extname } from 'node:path';

import { createFileChunk } from './chunk-factory.js';
import { EXTRACTORS } from './extractors/index.js';
import type { CodeChunk, ExtractorKind } from './types.js';

/**
 * Extension (lowercase, no dot) to extractor variant.
 * Anything not listed goes to the generic extractor.
 */
export const EXTENSION_TO_EXTRACTOR: Readonly<Record<string, ExtractorKind>> = {
  // Python
  py: 'indentation',
  pyw: 'indentation',
  pyi: 'indentation',

  // JavaScript / TypeScript
  js: 'brace',
  jsx: 'brace',
  mjs: 'brace',
  cjs: 'brace',
  ts: 'brace',
  tsx: 'brace',
  mts: 'brace',
  cts: 'brace',

  // JVM
  java: 'declaration',
  kt: 'declaration',
  kts: 'declaration',
};

/**
 * Look up the extractor variant for an extension.
 * Accepts `'.ts'`, `'ts'` or `'TS'`.
 */
export function getExtractorKind(extension: string): ExtractorKind {
  const normalized = extension.replace(/^\./, '').toLowerCase();
  return EXTENSION_TO_EXTRACTOR[normalized] ?? 'generic';
}

/**
 * Split a file into code-aware chunks.
 *
 * @param filePath - Path used for language detection and chunk metadata
 * @param content - Decoded file content
 * @param repoRoot - Repository root, used for project detection
 * @returns function/class chunks, or exactly one `file` chunk
 *
 * @example
 * ```typescript
 * const chunks = parseFile('src/app.py', source);
 * chunks.map((c) => `${c.kind}:${c.name}`); // ['class:App', 'function:run']
 * ```
 */
export function parseFile(
  filePath: string,
  content: string,
  repoRoot?: string
): CodeChunk[] {
  const kind = getExtractorKind(extname(filePath));
  const chunks = EXTRACTORS[kind].extract(filePath, content, repoRoot);

  if (chunks.length === 0) {
    return [createFileChunk(filePath, content, repoRoot)];
  }
  return chunks;
}
