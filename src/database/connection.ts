/**
 * Database Connection Module
 *
 * Opens the SQLite chunk store with better-sqlite3 and brings its schema up
 * to date. Connections are owned by the caller; there is no process-wide
 * singleton.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { DatabaseError } from '../errors/index.js';
import { runMigrations } from './migrate.js';

/** Path that opens a private in-memory database */
export const IN_MEMORY = ':memory:';

/**
 * Open (creating if needed) the database at `dbPath` and apply migrations.
 *
 * @example
 * ```ts
 * const db = openDatabase(resolveStoragePath(config));
 * const store = new ChunkStore(db);
 * ```
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(
      `Cannot open index database at ${dbPath}`,
      error instanceof Error ? error : undefined
    );
  }

  // WAL gives concurrent readers while `cbi index` writes
  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  const result = runMigrations(db);
  if (result.failed.length > 0) {
    db.close();
    const details = result.failed.map((f) => `${f.name}: ${f.error}`).join('; ');
    throw new DatabaseError(`Database migration failed: ${details}`);
  }

  return db;
}
