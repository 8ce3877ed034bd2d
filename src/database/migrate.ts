/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order and records them in `_migrations`.
 * Running it twice is a no-op.
 */

import type Database from 'better-sqlite3';

export interface MigrationResult {
  /** Migrations applied by this call */
  applied: string[];
  failed: Array<{ name: string; error: string }>;
}

export const MIGRATIONS: ReadonlyArray<{ name: string; sql: string }> = [
  {
    name: '001-chunks.sql',
    sql: `
-- Embedded chunks. metadata holds the record's flat metadata as JSON.
CREATE TABLE IF NOT EXISTS chunks (
  id TEXT PRIMARY KEY,
  content TEXT NOT NULL,
  embedding BLOB NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Facts about the index as a whole (embedding model, dimensions, built_at)
CREATE TABLE IF NOT EXISTS index_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`,
  },
];

const TRACKING_TABLE = `
CREATE TABLE IF NOT EXISTS _migrations (
  name TEXT PRIMARY KEY,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

/**
 * Apply every migration not yet recorded. Each runs in its own transaction;
 * the first failure stops the run.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  db.exec(TRACKING_TABLE);

  const appliedRows = db.prepare('SELECT name FROM _migrations').pluck().all();
  const alreadyApplied = new Set(appliedRows.filter((row): row is string => typeof row === 'string'));

  const result: MigrationResult = { applied: [], failed: [] };
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const migration of MIGRATIONS) {
    if (alreadyApplied.has(migration.name)) continue;

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        record.run(migration.name);
      })();
      result.applied.push(migration.name);
    } catch (error) {
      result.failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
      break;
    }
  }

  return result;
}
