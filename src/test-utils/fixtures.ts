/**
 * Temporary Repositories
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export interface TempRepo {
  root: string;
  path(relativePath: string): string;
  cleanup(): void;
}

/**
 * Write `files` (relative path → content) under a fresh temp directory.
 */
export function createTempRepo(files: Record<string, string | Buffer>): TempRepo {
  const root = mkdtempSync(join(tmpdir(), 'cbi-test-'));

  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, relativePath);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }

  return {
    root,
    path: (relativePath: string) => join(root, relativePath),
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}
