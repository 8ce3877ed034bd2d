/**
 * Indentation Extractor
 *
 * Python extraction on a real parse tree (tree-sitter-python). Every
 * function and class definition becomes a chunk, visited in pre-order so an
 * outer definition comes before the definitions nested in it. Method chunks
 * therefore overlap their class chunk.
 *
 * A file that does not parse cleanly yields a single whole-file chunk.
 * Chunks end at their last line of code; trailing comments are left out.
 */

import Parser from 'tree-sitter';
import PythonLang from 'tree-sitter-python';

import { createChunk, createFileChunk, splitLines, uniqueInOrder } from '../chunk-factory.js';
import type { CodeChunk, Extractor } from '../types.js';

// tree-sitter's Language type (compiled grammar) as setLanguage expects it
type TreeSitterLanguage = Parameters<Parser['setLanguage']>[0];

let parser: Parser | null = null;

function getParser(): Parser {
  if (!parser) {
    parser = new Parser();
    parser.setLanguage(PythonLang as TreeSitterLanguage);
  }
  return parser;
}

// The binding copies input through a buffer of this many UTF-16 units
const DEFAULT_BUFFER_SIZE = 32 * 1024;

// Statements the grammar still accepts but Python 3 rejects
const PYTHON2_ONLY = ['print_statement', 'exec_statement'];

/**
 * Parse Python source. Returns null when the tree contains syntax errors;
 * parser exceptions propagate.
 */
export function parsePython(content: string): Parser.Tree | null {
  const tree = getParser().parse(content, undefined, {
    bufferSize: Math.max(DEFAULT_BUFFER_SIZE, content.length + 1),
  });

  const root = tree.rootNode;
  if (root.hasError || root.descendantsOfType(PYTHON2_ONLY).length > 0) {
    return null;
  }
  return tree;
}

/**
 * Row of the last token that is not a comment. A block's end position
 * includes comments trailing its last statement.
 */
function lastCodeRow(node: Parser.SyntaxNode): number {
  const { children } = node;
  for (let i = children.length - 1; i >= 0; i--) {
    const child = children[i];
    if (child && child.type !== 'comment') {
      return lastCodeRow(child);
    }
  }
  return node.endPosition.row;
}

/**
 * Unwrap `@decorator` wrappers to the definition they decorate.
 */
function unwrapDecorated(node: Parser.SyntaxNode): Parser.SyntaxNode {
  if (node.type === 'decorated_definition') {
    return node.childForFieldName('definition') ?? node;
  }
  return node;
}

/**
 * Names of function definitions directly in a class body.
 */
function classMembers(classNode: Parser.SyntaxNode): string[] {
  const body = classNode.childForFieldName('body');
  if (!body) return [];

  const names: string[] = [];
  for (const child of body.namedChildren) {
    const definition = unwrapDecorated(child);
    if (definition.type !== 'function_definition') continue;

    const name = definition.childForFieldName('name')?.text;
    if (name) names.push(name);
  }
  return uniqueInOrder(names);
}

function extractIndentationChunks(
  filePath: string,
  content: string,
  repoRoot?: string
): CodeChunk[] {
  const tree = parsePython(content);
  if (!tree) {
    return [createFileChunk(filePath, content, repoRoot)];
  }

  const lines = splitLines(content);
  const chunks: CodeChunk[] = [];

  const visit = (node: Parser.SyntaxNode): void => {
    if (node.type === 'function_definition' || node.type === 'class_definition') {
      const name = node.childForFieldName('name')?.text;
      if (name) {
        const isClass = node.type === 'class_definition';
        chunks.push(
          createChunk({
            filePath,
            lines,
            kind: isClass ? 'class' : 'function',
            name,
            startLine: node.startPosition.row,
            endLine: lastCodeRow(node) + 1,
            members: isClass ? classMembers(node) : [],
            repoRoot,
          })
        );
      }
    }

    for (const child of node.namedChildren) {
      visit(child);
    }
  };

  visit(tree.rootNode);
  return chunks;
}

export const indentationExtractor: Extractor = {
  kind: 'indentation',
  extract: extractIndentationChunks,
};
