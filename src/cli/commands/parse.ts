/**
 * Parse Command
 *
 * Shows how a single file is chunked, without embedding anything.
 *
 *   cbi parse src/app.py
 *   cbi parse src/app.py --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { CommandContext } from '../types.js';
import { parseFile } from '../../indexer/chunker/dispatcher.js';
import type { CodeChunk } from '../../indexer/chunker/types.js';
import { decodeContent } from '../../indexer/loader.js';
import { FileNotFoundError } from '../../errors/index.js';

interface ParseCommandOptions {
  json?: boolean;
}

/**
 * One line per chunk: kind, name, line range, and class members.
 */
export function formatChunkLine(chunk: CodeChunk): string {
  const range = `${chunk.startLine}-${chunk.endLine}`;
  const members = chunk.members.length > 0 ? chalk.dim(` [${chunk.members.join(', ')}]`) : '';
  return `${chalk.cyan(chunk.kind.padEnd(9))}${chunk.name} ${chalk.dim(`(lines ${range})`)}${members}`;
}

export function createParseCommand(getContext: () => CommandContext): Command {
  return new Command('parse')
    .argument('<file>', 'Source file to chunk')
    .description('Print the code chunks extracted from a file')
    .option('--json', 'Print chunks as JSON', false)
    .action((file: string, cmdOptions: ParseCommandOptions) => {
      const ctx = getContext();
      const filePath = resolve(file);

      if (!existsSync(filePath)) {
        throw new FileNotFoundError(filePath);
      }

      const chunks = parseFile(filePath, decodeContent(readFileSync(filePath)));

      if (cmdOptions.json || ctx.options.json) {
        console.log(JSON.stringify(chunks, null, 2));
        return;
      }

      ctx.log(chalk.bold(`${chunks.length} chunk(s) in ${file}`));
      ctx.log('');
      for (const chunk of chunks) {
        ctx.log(`  ${formatChunkLine(chunk)}`);
      }
    });
}
