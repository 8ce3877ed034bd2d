/**
 * Chat Command
 *
 * Interactive multi-turn REPL over the codebase assistant.
 *
 *   cbi chat
 *   cbi chat -c refactor-notes
 *
 * REPL commands:
 *   /history   show this conversation
 *   /clear     forget this conversation
 *   /help      list commands
 *   exit, quit leave
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as readline from 'node:readline';

import type { CommandContext } from '../types.js';
import { openAssistant } from '../utils/assistant.js';
import { ConversationOptionsSchema, validateInput } from '../validation.js';
import type { CodebaseAssistant } from '../../agent/assistant.js';
import { CLIError, ValidationError } from '../../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ChatState {
  assistant: CodebaseAssistant;
  conversationId: string;
  /** Show a spinner while the agent works */
  interactive: boolean;
}

interface ChatCommandOptions {
  conversation?: string;
}

const EXIT_WORDS = new Set(['exit', 'quit']);

const HISTORY_PREVIEW_LENGTH = 200;

// ============================================================================
// Input handling
// ============================================================================

function showHelp(ctx: CommandContext): void {
  ctx.log(chalk.bold('Commands:'));
  ctx.log(`  ${chalk.cyan('/history')}   Show this conversation`);
  ctx.log(`  ${chalk.cyan('/clear')}     Forget this conversation`);
  ctx.log(`  ${chalk.cyan('/help')}      Show this help`);
  ctx.log(`  ${chalk.cyan('exit')}       Leave the chat`);
}

function showHistory(state: ChatState, ctx: CommandContext): void {
  const history = state.assistant.getConversationHistory(state.conversationId);
  if (history.length === 0) {
    ctx.log(chalk.dim('No messages yet.'));
    return;
  }

  for (const message of history) {
    if (message.role === 'tool') continue;
    if (message.role === 'assistant' && message.content.length === 0) continue;

    const label = message.role === 'user' ? chalk.cyan('you') : chalk.green('assistant');
    const text =
      message.content.length > HISTORY_PREVIEW_LENGTH
        ? `${message.content.slice(0, HISTORY_PREVIEW_LENGTH)}...`
        : message.content;
    ctx.log(`${label}: ${text}`);
  }
}

/**
 * Handle one line of REPL input.
 *
 * @returns false when the chat should end
 */
export async function handleChatInput(
  line: string,
  state: ChatState,
  ctx: CommandContext
): Promise<boolean> {
  const input = line.trim();
  if (!input) return true;

  if (EXIT_WORDS.has(input.toLowerCase())) {
    return false;
  }

  switch (input) {
    case '/history':
      showHistory(state, ctx);
      return true;
    case '/clear': {
      const cleared = state.assistant.clearConversation(state.conversationId);
      ctx.log(chalk.dim(cleared ? 'Conversation cleared.' : 'Nothing to clear.'));
      return true;
    }
    case '/help':
      showHelp(ctx);
      return true;
  }

  if (input.startsWith('/')) {
    ctx.warn(`Unknown command: ${input} (try /help)`);
    return true;
  }

  const spinner = state.interactive ? ora('Thinking...').start() : null;
  try {
    const answer = await state.assistant.query(input, state.conversationId);
    spinner?.stop();
    ctx.log('');
    ctx.log(answer);
    ctx.log('');
  } catch (error) {
    spinner?.stop();
    if (error instanceof CLIError) {
      ctx.error(error.message);
      if (error.hint) ctx.log(chalk.dim(error.hint));
    } else {
      ctx.error(`Failed to process question: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return true;
}

// ============================================================================
// REPL
// ============================================================================

/**
 * Event-based readline loop; resolves when the user leaves or input ends.
 */
function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.cyan('you> '),
    });

    let closed = false;
    const finish = (): void => {
      if (closed) return;
      closed = true;
      rl.close();
      resolve();
    };

    rl.on('line', (line) => {
      rl.pause();
      handleChatInput(line, state, ctx)
        .then((keepGoing) => {
          if (!keepGoing) {
            ctx.log(chalk.dim('Goodbye!'));
            finish();
            return;
          }
          rl.resume();
          rl.prompt();
        })
        .catch((error: unknown) => {
          ctx.error(error instanceof Error ? error.message : String(error));
          rl.resume();
          rl.prompt();
        });
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      finish();
    });

    rl.on('close', finish);

    ctx.log(chalk.bold('Codebase chat'));
    ctx.log(chalk.dim(`Conversation: ${state.conversationId}. Type /help for commands, exit to leave.`));
    ctx.log('');
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Start an interactive conversation about the codebase')
    .option('-c, --conversation <id>', 'Conversation to continue', 'default')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();

      const options = validateInput(ConversationOptionsSchema, cmdOptions);
      if (!options.success) throw new ValidationError(options.error);

      const assistant = await openAssistant(ctx);
      try {
        await runChatREPL(
          {
            assistant,
            conversationId: options.data.conversation,
            interactive: process.stdout.isTTY ?? false,
          },
          ctx
        );
      } finally {
        await assistant.close();
      }
    });
}
