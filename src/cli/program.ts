/**
 * CLI Program
 *
 * Sets up Commander.js with global options and registers all subcommands.
 * Kept apart from the entry point so tests can build the program without
 * parsing process.argv.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';

import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { createParseCommand } from './commands/parse.js';
import { createServeCommand } from './commands/serve.js';
import { CLIError } from '../errors/index.js';
import { safeJsonParse } from '../utils/json.js';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version from package.json (two levels up from both src/cli and dist/cli).
 */
function readVersion(): string {
  try {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    return safeJsonParse(raw, PackageJsonSchema, { version: '0.0.0' }).version;
  } catch {
    return '0.0.0';
  }
}

export const VERSION = readVersion();

/**
 * Create a command context with logging utilities.
 * This is passed to all command handlers.
 */
export function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    info: (message: string) => {
      if (!options.json) {
        console.error(chalk.dim(message));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cbi')
    .description('Code-aware indexing and question answering over a source repository')
    .version(VERSION, '-v, --version', 'Display version number')

    // Global options - available to ALL subcommands
    .option('--verbose', 'Enable verbose output for debugging', false)
    .option('--json', 'Output results as JSON', false)

    .addHelpText(
      'after',
      `
${chalk.dim('Examples:')}
  ${chalk.cyan('cbi index ./my-repo')}               Index a repository
  ${chalk.cyan('cbi index . --dry-run')}             Count files and chunks only
  ${chalk.cyan('cbi parse src/app.py')}              Show how one file is chunked
  ${chalk.cyan('cbi ask "How does auth work?"')}     Ask a question
  ${chalk.cyan('cbi chat')}                          Multi-turn conversation
  ${chalk.cyan('cbi serve --port 8000')}             Start the HTTP API
  ${chalk.cyan('cbi config set search.top_k 8')}     Change a setting
`
    );

  /**
   * Commander stores options on the Command object after parsing
   */
  const getGlobalOptions = (): GlobalOptions => {
    const opts = program.opts<Partial<GlobalOptions>>();
    return {
      verbose: opts.verbose ?? false,
      json: opts.json ?? false,
    };
  };
  const getContext = (): CommandContext => createContext(getGlobalOptions());

  program.addCommand(createIndexCommand(getContext));
  program.addCommand(createParseCommand(getContext));
  program.addCommand(createAskCommand(getContext));
  program.addCommand(createChatCommand(getContext));
  program.addCommand(createServeCommand(getContext, VERSION));
  program.addCommand(createConfigCommand(getContext));

  program.on('command:*', (operands: string[]) => {
    throw new CLIError(
      `Unknown command: ${operands[0]}`,
      'Run: cbi --help  to see available commands'
    );
  });

  return program;
}
