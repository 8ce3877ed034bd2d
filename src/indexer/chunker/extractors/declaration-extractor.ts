/**
 * Declaration Extractor
 *
 * Extraction for Java and Kotlin. Only type declarations (class, interface,
 * enum, record, object) become chunks; methods are listed as class members.
 * Top-level functions outside a type are not extracted.
 */

import { findBlockEnd } from '../boundary.js';
import { createChunk, createFileChunk, splitLines, uniqueInOrder } from '../chunk-factory.js';
import type { CodeChunk, Extractor } from '../types.js';

const TYPE_PATTERN =
  /^\s*(?:(?:public|protected|private|internal|static|final|abstract|sealed|open|data|inner|strictfp)\s+)*(?:class|interface|enum(?:\s+class)?|record|object)\s+([A-Za-z_]\w*)/;

/** Java-style `[modifiers] ReturnType name(` */
const METHOD_PATTERN =
  /^\s*(?:(?:public|protected|private|static|final|synchronized|abstract|native|default)\s+)*([\w<>[\].?,]+)\s+([A-Za-z_]\w*)\s*\(/;

/** Kotlin `[modifiers] fun [<T>] [Receiver.]name(` */
const FUN_PATTERN =
  /^\s*(?:(?:public|private|protected|internal|override|open|suspend|inline|abstract|final|operator|infix)\s+)*fun\s+(?:<[^>]*>\s*)?(?:[\w.]+\.)?([A-Za-z_]\w*)\s*\(/;

/** Statement keywords that the return-type slot would otherwise accept */
const STATEMENT_KEYWORDS = new Set([
  'return',
  'new',
  'else',
  'throw',
  'case',
  'yield',
  'await',
  'if',
  'for',
  'while',
  'switch',
  'catch',
  'synchronized',
]);

function memberName(line: string): string | undefined {
  const fun = FUN_PATTERN.exec(line);
  if (fun?.[1]) return fun[1];

  const method = METHOD_PATTERN.exec(line);
  const returnType = method?.[1];
  const name = method?.[2];
  if (!returnType || !name) return undefined;
  if (STATEMENT_KEYWORDS.has(returnType) || STATEMENT_KEYWORDS.has(name)) {
    return undefined;
  }
  return name;
}

export function findDeclarationMembers(typeLines: readonly string[]): string[] {
  const members: string[] = [];
  for (const line of typeLines) {
    const name = memberName(line);
    if (name) members.push(name);
  }
  return uniqueInOrder(members);
}

function extractDeclarationChunks(
  filePath: string,
  content: string,
  repoRoot?: string
): CodeChunk[] {
  const lines = splitLines(content);
  const chunks: CodeChunk[] = [];

  lines.forEach((line, i) => {
    const match = TYPE_PATTERN.exec(line);
    const name = match?.[1];
    if (!name) return;

    const end = findBlockEnd(lines, i);
    chunks.push(
      createChunk({
        filePath,
        lines,
        kind: 'class',
        name,
        startLine: i,
        endLine: end,
        members: findDeclarationMembers(lines.slice(i, end)),
        repoRoot,
      })
    );
  });

  if (chunks.length === 0) {
    return [createFileChunk(filePath, content, repoRoot)];
  }

  return chunks;
}

export const declarationExtractor: Extractor = {
  kind: 'declaration',
  extract: extractDeclarationChunks,
};
