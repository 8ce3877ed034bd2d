/**
 * Ask Command
 *
 * One question, one answer, using the indexed repository.
 *
 *   cbi ask "How does authentication work?"
 *   cbi ask "And where is the token checked?" -c auth
 *   cbi ask "What does the loader skip?" --json
 *
 * Builds the index first when none exists.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { CommandContext } from '../types.js';
import { openAssistant } from '../utils/assistant.js';
import { AskArgsSchema, ConversationOptionsSchema, validateInput } from '../validation.js';
import { ValidationError } from '../../errors/index.js';

interface AskCommandOptions {
  conversation?: string;
}

/**
 * JSON output format for the ask command.
 */
export interface AskOutputJSON {
  question: string;
  answer: string;
  conversation_id: string;
  totalMs: number;
}

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question about the codebase')
    .description('Ask a question about the indexed codebase')
    .option('-c, --conversation <id>', 'Conversation to continue', 'default')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const args = validateInput(AskArgsSchema, { question });
      if (!args.success) throw new ValidationError(args.error);
      const options = validateInput(ConversationOptionsSchema, cmdOptions);
      if (!options.success) throw new ValidationError(options.error);

      const conversationId = options.data.conversation;
      const startTime = performance.now();
      const assistant = await openAssistant(ctx);

      const spinner =
        !ctx.options.json && process.stdout.isTTY ? ora('Thinking...').start() : null;

      let answer: string;
      try {
        answer = await assistant.query(args.data.question, conversationId);
        spinner?.stop();
      } catch (error) {
        spinner?.fail('Failed to answer');
        throw error;
      } finally {
        await assistant.close();
      }

      if (ctx.options.json) {
        const output: AskOutputJSON = {
          question: args.data.question,
          answer,
          conversation_id: conversationId,
          totalMs: Math.round(performance.now() - startTime),
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      ctx.log(answer);
      ctx.debug(`Answered in ${Math.round(performance.now() - startTime)}ms`);
      if (conversationId !== 'default') {
        ctx.log(chalk.dim(`\n(conversation: ${conversationId})`));
      }
    });
}
