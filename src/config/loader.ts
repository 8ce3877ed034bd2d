/**
 * Configuration Loader
 *
 * Config lifecycle:
 * 1. Find/create the cbi home directory
 * 2. Load config.toml if it exists (writing the template on first run)
 * 3. Validate the user's sparse overrides with PartialConfigSchema
 * 4. Deep-merge them over DEFAULT_CONFIG and validate the result
 * 5. Apply environment overrides (LLM_MODEL)
 */

import * as fs from 'node:fs';
import { dirname } from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';

import { ConfigError } from '../errors/index.js';
import { CONFIG_TEMPLATE, DEFAULT_CONFIG } from './defaults.js';
import { getEnv } from './env.js';
import { expandHome, getConfigPath, getDbPath } from './paths.js';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';

// ============================================================================
// Helpers
// ============================================================================

type PlainRecord = Record<string, unknown>;

function isRecord(value: unknown): value is PlainRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Deep merge, with source values overriding target. Arrays are replaced,
 * not concatenated.
 */
export function deepMerge(target: PlainRecord, source: PlainRecord): PlainRecord {
  const result: PlainRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = target[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Convert a plain object to the JSON map @iarna/toml writes, dropping
 * undefined and null values.
 */
function toTomlMap(value: PlainRecord): TOML.JsonMap {
  const map: TOML.JsonMap = {};
  for (const [key, entry] of Object.entries(value)) {
    const converted = toTomlValue(entry);
    if (converted !== undefined) map[key] = converted;
  }
  return map;
}

function toTomlValue(value: unknown): TOML.AnyJson | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    // Config lists hold primitives only
    return value.map((item: unknown) =>
      typeof item === 'number' || typeof item === 'boolean' ? item : String(item)
    );
  }
  if (isRecord(value)) return toTomlMap(value);
  return String(value);
}

function ensureConfigDir(configPath: string): void {
  const dir = dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function readTomlFile(configPath: string): PlainRecord {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }
}

function applyEnvOverrides(config: Config): Config {
  const model = getEnv('LLM_MODEL');
  if (!model) return config;
  return { ...config, llm: { ...config.llm, model } };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Merge sparse user overrides over the defaults and validate the result.
 *
 * @throws ConfigError when the overrides or the merged config are invalid
 */
export function resolveConfig(overrides: unknown): Config {
  const partial = PartialConfigSchema.safeParse(overrides);
  if (!partial.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(partial.error.issues)}`);
  }

  const merged = ConfigSchema.safeParse(deepMerge({ ...DEFAULT_CONFIG }, partial.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(merged.error.issues)}`);
  }
  return merged.data;
}

/**
 * Load config.toml merged over the defaults.
 *
 * @param createIfMissing - Write the commented template on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureConfigDir(configPath);
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return applyEnvOverrides(resolveConfig({}));
  }

  return applyEnvOverrides(resolveConfig(readTomlFile(configPath)));
}

/**
 * Absolute path of the chunk store for a config.
 */
export function resolveStoragePath(config: Config): string {
  return config.storage.path ? expandHome(config.storage.path) : getDbPath();
}

/**
 * Get a config value by dot-notation path.
 *
 * @example getConfigValue('embedding.model') // 'text-embedding-3-small'
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Parse a CLI string into a boolean, number, list or string.
 * Comma-separated values become lists (`py,ts` → ['py', 'ts']).
 */
export function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  if (value.includes(',')) {
    return value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
  }

  return value;
}

function setPath(obj: PlainRecord, parts: string[], value: unknown): PlainRecord {
  const [head, ...rest] = parts;
  if (head === undefined) return obj;
  if (rest.length === 0) return { ...obj, [head]: value };

  const child = obj[head];
  return { ...obj, [head]: setPath(isRecord(child) ? child : {}, rest, value) };
}

/**
 * Set a config value by dot-notation path and write it back to config.toml.
 * Only the user's own overrides are written, not the merged defaults.
 *
 * @throws ConfigError when the key is unknown or the value fails validation
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  if (parts.length === 0) {
    throw new ConfigError('Invalid config key: empty key');
  }
  if (getConfigValue(key) === undefined) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const configPath = getConfigPath();
  ensureConfigDir(configPath);

  const current = fs.existsSync(configPath) ? readTomlFile(configPath) : {};
  const updated = setPath(current, parts, parseValue(value));

  try {
    resolveConfig(updated);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(
        `Invalid value for '${key}': ${error.message}`,
        'Run: cbi config list  to see current values and types'
      );
    }
    throw error;
  }

  fs.writeFileSync(configPath, TOML.stringify(toTomlMap(updated)), 'utf-8');
}

/**
 * Every config value as [dotted key, value] pairs.
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  const flatten = (obj: PlainRecord, prefix = ''): void => {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  };

  flatten(loadConfig());
  return entries;
}
