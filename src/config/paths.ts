/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.cbi/            (or $CBI_HOME)
 * ├── config.toml    (user configuration)
 * └── index.db       (SQLite chunk store)
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

import { getEnv } from './env.js';

export const CONFIG_FILE_NAME = 'config.toml';
export const DB_FILE_NAME = 'index.db';

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/**
 * The cbi home directory: $CBI_HOME when set, otherwise ~/.cbi
 */
export function getCbiDir(): string {
  const override = getEnv('CBI_HOME');
  return override ? resolve(expandHome(override)) : join(homedir(), '.cbi');
}

export function getConfigPath(): string {
  return join(getCbiDir(), CONFIG_FILE_NAME);
}

/**
 * Default location of the chunk store
 */
export function getDbPath(): string {
  return join(getCbiDir(), DB_FILE_NAME);
}
