/**
 * Serve Command
 *
 * Starts the HTTP API. The listener comes up first; the assistant is
 * initialized in the background and routes answer 503 until it is ready.
 *
 *   cbi serve
 *   cbi serve --port 9000 --host 0.0.0.0
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { ServeOptionsSchema, validateInput } from '../validation.js';
import { CodebaseAssistant } from '../../agent/assistant.js';
import { loadConfig } from '../../config/loader.js';
import { ValidationError } from '../../errors/index.js';
import { startServer } from '../../server/index.js';

interface ServeCommandOptions {
  port?: string;
  host?: string;
}

export function createServeCommand(
  getContext: () => CommandContext,
  version: string
): Command {
  return new Command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'Port to listen on (default: server.port from config)')
    .option('--host <host>', 'Interface to bind (default: server.host from config)')
    .action(async (cmdOptions: ServeCommandOptions) => {
      const ctx = getContext();

      const validated = validateInput(ServeOptionsSchema, cmdOptions);
      if (!validated.success) throw new ValidationError(validated.error);

      const config = loadConfig();
      const assistant = new CodebaseAssistant({ config, logger: ctx });

      const running = await startServer({
        host: validated.data.host ?? config.server.host,
        port: validated.data.port ?? config.server.port,
        getAssistant: () => assistant,
        logger: ctx,
        version,
      });
      ctx.log(`${chalk.green('✓')} Listening at ${chalk.cyan(running.url)}`);

      const shutdown = (): void => {
        Promise.all([running.close(), assistant.close()])
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            ctx.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
          });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);

      try {
        await assistant.initialize();
      } catch (error) {
        // Keep serving: /health reports system_ready=false, other routes 503
        ctx.error(
          `Initialization failed: ${error instanceof Error ? error.message : String(error)}`
        );
        return;
      }

      if (!assistant.isInitialized()) {
        ctx.warn('No index available; run cbi index, then restart the server.');
      }
    });
}
