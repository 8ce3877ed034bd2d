/**
 * Brace Extractor
 *
 * Line-oriented extraction for JavaScript and TypeScript. Each line is tested
 * against anchored patterns for:
 * - named function declarations (`export`, `default`, `async`, generators)
 * - arrow functions bound to a variable (`const handler = async (req) => {`)
 * - class declarations (`export default abstract class Foo`)
 *
 * Block ends come from the boundary scanner. No grammar is involved, so
 * nested functions produce their own chunks and braces inside strings count.
 */

import { findBlockEnd } from '../boundary.js';
import { createChunk, createFileChunk, splitLines, uniqueInOrder } from '../chunk-factory.js';
import type { CodeChunk, Extractor } from '../types.js';

// ============================================================================
// Patterns
// ============================================================================

const IDENT = '([A-Za-z_$][\\w$]*)';

const FUNCTION_PATTERN = new RegExp(
  `^\\s*(?:export\\s+)?(?:default\\s+)?(?:async\\s+)?function\\s*\\*?\\s*${IDENT}\\s*[<(]`
);

const ARROW_PATTERN = new RegExp(
  `^\\s*(?:export\\s+)?(?:const|let|var)\\s+${IDENT}\\s*(?::[^=]+)?=\\s*(?:async\\s*)?\\(?.*?\\)?\\s*=>`
);

const CLASS_PATTERN = new RegExp(
  `^\\s*(?:export\\s+)?(?:default\\s+)?(?:abstract\\s+)?class\\s+${IDENT}`
);

const METHOD_PATTERN =
  /^\s*(?:(?:public|private|protected|static|readonly|override|abstract|async|get|set)\s+)*\*?\s*(#?[A-Za-z_$][\w$]*)\s*[<(]/;

/** Call-like keywords that look like `name(` but are never methods */
const CONTROL_KEYWORDS = new Set([
  'if',
  'for',
  'while',
  'switch',
  'catch',
  'with',
  'return',
  'function',
  'typeof',
  'await',
  'new',
  'super',
  'do',
  'else',
  'throw',
  'yield',
  'void',
  'delete',
]);

// ============================================================================
// Extraction
// ============================================================================

/**
 * Collect method names from the lines of a class body.
 * The declaration line itself is skipped.
 */
export function findClassMembers(classLines: readonly string[]): string[] {
  const members: string[] = [];

  for (const line of classLines.slice(1)) {
    const match = METHOD_PATTERN.exec(line);
    const name = match?.[1];
    if (name && !CONTROL_KEYWORDS.has(name)) {
      members.push(name);
    }
  }

  return uniqueInOrder(members);
}

function extractBraceChunks(
  filePath: string,
  content: string,
  repoRoot?: string
): CodeChunk[] {
  const lines = splitLines(content);
  const chunks: CodeChunk[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';

    const fn = FUNCTION_PATTERN.exec(line);
    if (fn?.[1]) {
      const end = findBlockEnd(lines, i);
      chunks.push(
        createChunk({ filePath, lines, kind: 'function', name: fn[1], startLine: i, endLine: end, repoRoot })
      );
      continue;
    }

    const arrow = ARROW_PATTERN.exec(line);
    if (arrow?.[1]) {
      // Expression-bodied arrows stay on one line
      const end = line.includes('{') ? findBlockEnd(lines, i) : i + 1;
      chunks.push(
        createChunk({ filePath, lines, kind: 'function', name: arrow[1], startLine: i, endLine: end, repoRoot })
      );
      continue;
    }

    const cls = CLASS_PATTERN.exec(line);
    if (cls?.[1]) {
      const end = findBlockEnd(lines, i);
      chunks.push(
        createChunk({
          filePath,
          lines,
          kind: 'class',
          name: cls[1],
          startLine: i,
          endLine: end,
          members: findClassMembers(lines.slice(i, end)),
          repoRoot,
        })
      );
    }
  }

  if (chunks.length === 0) {
    return [createFileChunk(filePath, content, repoRoot)];
  }

  return chunks;
}

export const braceExtractor: Extractor = {
  kind: 'brace',
  extract: extractBraceChunks,
};
