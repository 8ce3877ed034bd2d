/**
 * Project-Context Resolver
 *
 * Derives which project a file belongs to from its path. Repositories that
 * host several projects keep them under a `projects/` directory:
 *
 *   <anything>/projects/<name>/<relative path>
 *   <repoRoot>/data/projects/<name>/<relative path>
 */

import { isAbsolute, relative, resolve } from 'node:path';

import type { ProjectContext } from './types.js';

/** Split on both separators so Windows-style paths resolve too */
function splitSegments(filePath: string): string[] {
  return filePath.split(/[\\/]+/).filter((segment) => segment.length > 0);
}

/**
 * Strategy 1: a `projects` segment (any case) followed by a project name.
 */
function resolveFromProjectsSegment(filePath: string): ProjectContext | null {
  const segments = splitSegments(filePath);

  for (let i = 0; i < segments.length - 1; i++) {
    if (segments[i]?.toLowerCase() !== 'projects') continue;

    const name = segments[i + 1];
    if (name === undefined) continue;

    return {
      name,
      relativePath: segments.slice(i + 2).join('/'),
    };
  }

  return null;
}

/**
 * Strategy 2: the file lives under `<repoRoot>/data/projects`.
 */
function resolveFromDataDirectory(
  filePath: string,
  repoRoot: string
): ProjectContext | null {
  const projectsRoot = resolve(repoRoot, 'data', 'projects');
  const rel = relative(projectsRoot, resolve(filePath));

  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }

  const [name, ...rest] = splitSegments(rel);
  if (name === undefined) return null;

  return { name, relativePath: rest.join('/') };
}

/**
 * Resolve the project a file belongs to.
 *
 * @returns the project name and the file's path inside it, or null when the
 * path carries no project structure
 *
 * @example
 * ```typescript
 * resolveProject('/work/projects/myapp/src/x.py');
 * // { name: 'myapp', relativePath: 'src/x.py' }
 * ```
 */
export function resolveProject(
  filePath: string,
  repoRoot?: string
): ProjectContext | null {
  const fromSegment = resolveFromProjectsSegment(filePath);
  if (fromSegment) return fromSegment;

  if (repoRoot) {
    return resolveFromDataDirectory(filePath, repoRoot);
  }

  return null;
}
