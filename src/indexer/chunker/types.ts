/**
 * Chunker Types
 *
 * Type definitions for code-aware chunking. A chunk is a contiguous range of
 * source lines tied to one definition (function or class), or the whole file
 * when no definition could be isolated.
 */

/**
 * What a chunk represents.
 * - function: a function, method, or variable-bound arrow function
 * - class: a class, interface, or enum declaration
 * - file: the whole file (fallback)
 */
export type ChunkKind = 'function' | 'class' | 'file';

/**
 * Project a file belongs to, derived from its path.
 * Both fields are always present together.
 */
export interface ProjectContext {
  /** Project directory name (segment after `projects/`) */
  name: string;

  /** File path relative to the project directory, forward slashes */
  relativePath: string;
}

/**
 * A code-aware chunk produced by an extractor.
 */
export interface CodeChunk {
  /** Lines [startLine, endLine) of the file, joined with '\n' */
  text: string;

  kind: ChunkKind;

  /** Identifier, or the file stem for `file` chunks */
  name: string;

  /** Method names in declaration order (non-empty only for classes) */
  members: string[];

  /** Zero-based, inclusive */
  startLine: number;

  /** Zero-based, exclusive */
  endLine: number;

  /** Lowercased extension without the dot, or 'unknown' */
  language: string;

  project?: ProjectContext;

  /** Path of the originating file, as given to the parser */
  sourcePath: string;
}

/**
 * Extractor variants. Every recognized extension maps to exactly one.
 * - indentation: parse-tree walk (Python)
 * - brace: anchored patterns + brace matching (JavaScript/TypeScript)
 * - declaration: type declarations + brace matching (Java/Kotlin)
 * - generic: whole file as one chunk
 */
export type ExtractorKind = 'indentation' | 'brace' | 'declaration' | 'generic';

/**
 * Common capability shared by all extractors.
 */
export interface Extractor {
  readonly kind: ExtractorKind;

  /**
   * Extract chunks from file content. May return an empty array; the
   * dispatcher then falls back to a whole-file chunk.
   */
  extract(filePath: string, content: string, repoRoot?: string): CodeChunk[];
}
