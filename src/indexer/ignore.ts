/**
 * Exclusion Rules
 *
 * Decides which walked files the loader skips: excluded directories (via
 * the 'ignore' package, gitignore semantics), binary extensions, and files
 * whose first bytes contain a NUL.
 */

import { open } from 'node:fs/promises';
import { extname, relative, sep } from 'node:path';
import ignore, { type Ignore } from 'ignore';

import { BINARY_EXTENSIONS, BINARY_SNIFF_BYTES, EXCLUDED_DIRECTORIES } from './types.js';

/**
 * A filter function that tests whether a path should be skipped.
 */
export type IgnoreFilter = (filePath: string) => boolean;

export interface IgnoreFilterOptions {
  /** Root the tested paths are relative to */
  rootPath: string;
}

/**
 * Create a filter that returns true for paths inside an excluded directory.
 *
 * Matching is case-insensitive, so `Node_Modules/x.js` is skipped too.
 *
 * @example
 * ```ts
 * const shouldSkip = createIgnoreFilter({ rootPath: '/repo' });
 * shouldSkip('packages/web/node_modules/react/index.js'); // true
 * shouldSkip('src/index.ts');                             // false
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath } = options;

  const ig: Ignore = ignore({ ignorecase: true });
  ig.add(EXCLUDED_DIRECTORIES.map((dir) => `${dir}/`));

  return (filePath: string): boolean => {
    let relativePath = filePath;
    if (filePath.startsWith(rootPath)) {
      relativePath = relative(rootPath, filePath);
    }

    // The ignore package expects forward slashes
    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }

    // Root itself, or something outside it
    if (relativePath === '' || relativePath.startsWith('..')) {
      return false;
    }

    return ig.ignores(relativePath);
  };
}

/**
 * Check the extension against the known binary formats.
 */
export function isBinaryFile(filename: string): boolean {
  const ext = extname(filename).slice(1).toLowerCase();
  return BINARY_EXTENSIONS.has(ext);
}

/**
 * True when the buffer contains a NUL byte.
 */
export function containsNullByte(buffer: Uint8Array): boolean {
  return buffer.includes(0);
}

/**
 * Read up to BINARY_SNIFF_BYTES from the start of a file and look for NUL.
 * Rejects when the file cannot be opened.
 */
export async function sniffBinary(filePath: string): Promise<boolean> {
  const handle = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, BINARY_SNIFF_BYTES, 0);
    return containsNullByte(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}
