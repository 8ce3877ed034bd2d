/**
 * codebase-intel - Library Entry Point
 *
 * The CLI (`cbi`) covers most use cases:
 * ```bash
 * cbi index ./my-repo                 # Build the index
 * cbi ask "How does auth work?"       # One question
 * cbi chat                            # Interactive conversation
 * cbi serve                           # HTTP API
 * ```
 *
 * The same pieces are exported for programmatic use.
 *
 * @example Chunk a single file
 * ```typescript
 * import { parseFile } from 'codebase-intel';
 *
 * const chunks = parseFile('src/auth.py', source);
 * ```
 *
 * @example Ask a question
 * ```typescript
 * import { CodebaseAssistant, loadConfig } from 'codebase-intel';
 *
 * const assistant = await new CodebaseAssistant({ config: loadConfig() }).initialize();
 * console.log(await assistant.query('Where are sessions validated?'));
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './indexer/index.js';
export * from './agent/index.js';
export * from './search/index.js';
export * from './database/index.js';
export * from './errors/index.js';

export {
  loadConfig,
  resolveConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  DEFAULT_CONFIG,
  ConfigSchema,
  type Config,
} from './config/index.js';

export { createApp, startServer, type CreateAppOptions, type RunningServer } from './server/index.js';
export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';
