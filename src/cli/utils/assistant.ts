/**
 * Shared assistant setup for ask, chat and serve.
 */

import { CodebaseAssistant, type InitializeOptions } from '../../agent/assistant.js';
import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { NotInitializedError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Create and initialize an assistant from config.toml.
 *
 * @throws NotInitializedError when no index exists and none could be built
 */
export async function openAssistant(
  ctx: CommandContext,
  options: InitializeOptions = {},
  config: Config = loadConfig()
): Promise<CodebaseAssistant> {
  const assistant = new CodebaseAssistant({ config, logger: ctx });
  await assistant.initialize(options);

  if (!assistant.isInitialized()) {
    throw new NotInitializedError();
  }
  return assistant;
}
