/**
 * Generic Extractor
 *
 * Used for every extension without a structural extractor (JSON, YAML,
 * Markdown, Go, ...). The whole file becomes one chunk.
 */

import { createFileChunk } from '../chunk-factory.js';
import type { CodeChunk, Extractor } from '../types.js';

export const genericExtractor: Extractor = {
  kind: 'generic',

  extract(filePath: string, content: string, repoRoot?: string): CodeChunk[] {
    return [createFileChunk(filePath, content, repoRoot)];
  },
};
