/**
 * Metadata Sanitization
 *
 * Flattens chunk metadata into primitives so any vector store can keep it.
 */

import { relative, sep } from 'node:path';

import type { CodeChunk } from './chunker/types.js';
import type { ChunkRecord, MetadataValue, RecordMetadata } from './types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert one metadata value to a storable primitive.
 *
 * - undefined/null → null
 * - string, number, boolean → unchanged
 * - arrays → comma-joined string forms (`['a', 'b']` → `'a,b'`)
 * - plain objects → compact JSON
 * - Date → ISO-8601
 * - anything else → String(value)
 */
export function sanitizeValue(value: unknown): MetadataValue {
  if (value === undefined || value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    default:
      break;
  }

  if (Array.isArray(value)) {
    return value.map((item) => String(item)).join(',');
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (isPlainObject(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Sanitize every value of a metadata map. Keys are kept as they are.
 */
export function sanitizeMetadata(metadata: Record<string, unknown>): RecordMetadata {
  const result: RecordMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    result[key] = sanitizeValue(value);
  }
  return result;
}

export interface RecordContext {
  /** Absolute repository root */
  repoRoot: string;

  /** Time the load started */
  loadedAt: Date;
}

/**
 * Turn a chunk into a storable record, adding repository-level metadata.
 */
export function toChunkRecord(chunk: CodeChunk, context: RecordContext): ChunkRecord {
  const repoRelative = relative(context.repoRoot, chunk.sourcePath).split(sep).join('/');

  const metadata = sanitizeMetadata({
    source_path: chunk.sourcePath,
    kind: chunk.kind,
    name: chunk.name,
    members: chunk.members,
    start_line: chunk.startLine,
    end_line: chunk.endLine,
    language: chunk.language,
    project_name: chunk.project?.name,
    project_relative_path: chunk.project?.relativePath,
    repo_relative_path: repoRelative,
    repo_root_path: context.repoRoot,
    load_timestamp: context.loadedAt,
    character_count: chunk.text.length,
  });

  return { text: chunk.text, metadata };
}
