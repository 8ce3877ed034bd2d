/**
 * Chunk construction helpers shared by every extractor.
 */

import { basename, extname } from 'node:path';

import { resolveProject } from './project-context.js';
import type { ChunkKind, CodeChunk } from './types.js';

/**
 * Lowercased extension without the dot, or 'unknown' for files without one.
 */
export function languageOf(filePath: string): string {
  const ext = extname(filePath).slice(1).toLowerCase();
  return ext || 'unknown';
}

/**
 * File name without its extension.
 */
export function fileStem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

export function splitLines(content: string): string[] {
  return content.split('\n');
}

interface ChunkInput {
  filePath: string;
  lines: readonly string[];
  kind: Exclude<ChunkKind, 'file'>;
  name: string;
  startLine: number;
  endLine: number;
  members?: string[];
  repoRoot?: string;
}

/**
 * Build a function/class chunk from a line range of the file.
 */
export function createChunk(input: ChunkInput): CodeChunk {
  const { filePath, lines, kind, name, startLine, endLine, repoRoot } = input;
  const project = resolveProject(filePath, repoRoot);

  return {
    text: lines.slice(startLine, endLine).join('\n'),
    kind,
    name,
    members: kind === 'class' ? (input.members ?? []) : [],
    startLine,
    endLine,
    language: languageOf(filePath),
    ...(project ? { project } : {}),
    sourcePath: filePath,
  };
}

/**
 * Build the whole-file fallback chunk.
 */
export function createFileChunk(
  filePath: string,
  content: string,
  repoRoot?: string
): CodeChunk {
  const project = resolveProject(filePath, repoRoot);

  return {
    text: content,
    kind: 'file',
    name: fileStem(filePath),
    members: [],
    startLine: 0,
    endLine: splitLines(content).length,
    language: languageOf(filePath),
    ...(project ? { project } : {}),
    sourcePath: filePath,
  };
}

/**
 * Drop repeated names, keeping the first occurrence.
 */
export function uniqueInOrder(names: readonly string[]): string[] {
  return [...new Set(names)];
}
