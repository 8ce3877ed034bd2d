/**
 * Config Command
 *
 *   cbi config list                     every value, grouped by section
 *   cbi config get llm.model            one value (or a whole section)
 *   cbi config set search.top_k 8       validated, then written to config.toml
 *   cbi config path                     where config.toml lives
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { getConfigPath, getConfigValue, listConfig, setConfigValue } from '../../config/index.js';
import { CLIError, ConfigError } from '../../errors/index.js';

/**
 * Scalars print bare; lists and sections print as compact JSON.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Split dotted keys into section → [field, value] pairs, sections in
 * first-seen order. Keys without a dot land in the '' section.
 */
export function groupBySection(
  entries: ReadonlyArray<[string, unknown]>
): Map<string, Array<[string, unknown]>> {
  const sections = new Map<string, Array<[string, unknown]>>();
  for (const [key, value] of entries) {
    const dot = key.indexOf('.');
    const section = dot === -1 ? '' : key.slice(0, dot);
    const field = dot === -1 ? key : key.slice(dot + 1);

    const fields = sections.get(section) ?? [];
    fields.push([field, value]);
    sections.set(section, fields);
  }
  return sections;
}

function reportFailure(ctx: CommandContext, error: unknown): void {
  if (!(error instanceof CLIError)) throw error;

  ctx.error(error.message);
  if (error.hint && !ctx.options.json) ctx.log(chalk.dim(error.hint));
  process.exitCode = error.code;
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Show or change settings in config.toml');

  configCmd
    .command('list')
    .alias('ls')
    .description('List every setting')
    .action(() => {
      const ctx = getContext();
      try {
        const entries = listConfig();
        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        for (const [section, fields] of groupBySection(entries)) {
          if (section) ctx.log(chalk.bold(`[${section}]`));
          for (const [field, value] of fields) {
            ctx.log(`  ${chalk.cyan(field.padEnd(20))}${chalk.yellow(formatValue(value))}`);
          }
          ctx.log('');
        }
        ctx.log(chalk.dim(getConfigPath()));
      } catch (error) {
        reportFailure(ctx, error);
      }
    });

  configCmd
    .command('get <key>')
    .description('Print one setting, e.g. embedding.model')
    .action((key: string) => {
      const ctx = getContext();
      try {
        const value = getConfigValue(key);
        if (value === undefined) {
          throw new ConfigError(`Unknown config key: ${key}`);
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        reportFailure(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Change one setting, e.g. search.top_k 8')
    .action((key: string, raw: string) => {
      const ctx = getContext();
      try {
        setConfigValue(key, raw);
        const value = getConfigValue(key);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value }));
        } else {
          ctx.log(`${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }
      } catch (error) {
        reportFailure(ctx, error);
      }
    });

  configCmd
    .command('path')
    .description('Print the location of config.toml')
    .action(() => {
      const ctx = getContext();
      if (ctx.options.json) {
        console.log(JSON.stringify({ path: getConfigPath() }));
      } else {
        ctx.log(getConfigPath());
      }
    });

  return configCmd;
}
