/**
 * Database Module
 *
 * SQLite storage for embedded chunks.
 */

export { openDatabase, IN_MEMORY } from './connection.js';
export { runMigrations, MIGRATIONS, type MigrationResult } from './migrate.js';
export {
  embeddingToBlob,
  blobToEmbedding,
  type Chunk,
  type IndexMeta,
  type IndexMetaKey,
} from './schema.js';
export {
  ChunkRowSchema,
  IndexMetaRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
  type ChunkRow,
  type IndexMetaRow,
} from './validation.js';
