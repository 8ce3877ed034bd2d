/**
 * Config Module
 *
 * Programmatic config access. CLI users go through `cbi config`.
 */

export {
  ConfigSchema,
  BaseConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  SearchConfigSchema,
  McpConnectionSchema,
} from './schema.js';
export type { Config, PartialConfig, McpConnection } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export {
  loadConfig,
  resolveConfig,
  resolveStoragePath,
  getConfigValue,
  setConfigValue,
  listConfig,
  parseValue,
  deepMerge,
} from './loader.js';

export { getCbiDir, getConfigPath, getDbPath, expandHome } from './paths.js';

export { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
