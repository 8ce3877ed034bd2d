/**
 * Error formatting and process-level handling for the CLI
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Include stack traces */
  verbose?: boolean;
  /** Emit JSON instead of colored text */
  json?: boolean;
}

/**
 * Shape of an error in JSON output (CLI --json and HTTP responses).
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Build the structured form of any thrown value.
 */
export function toErrorOutput(error: unknown, verbose = false): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof Error) {
    return {
      error: error.message,
      code: 1,
      stack: verbose ? error.stack : undefined,
    };
  }
  return { error: String(error), code: 1 };
}

function stackLines(stack: string | undefined): string[] {
  if (!stack) return [];
  return ['', chalk.dim('Stack trace:'), chalk.dim(stack)];
}

/**
 * Format an error for display, as colored text or as JSON.
 *
 * Plain Errors without --verbose get a hint pointing at --verbose.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (json) {
    return JSON.stringify(toErrorOutput(error, verbose), null, 2);
  }

  if (!(error instanceof Error)) {
    return chalk.red('Error: ') + String(error);
  }

  const lines = [chalk.red('Error: ') + error.message];

  if (error instanceof CLIError) {
    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }
    if (verbose) lines.push(...stackLines(error.stack));
  } else if (verbose) {
    lines.push(...stackLines(error.stack));
  } else {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  return lines.join('\n');
}

/**
 * Exit code for an error: CLIError carries its own, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for `uncaughtException` / `unhandledRejection`.
 *
 *   process.on('uncaughtException', createGlobalErrorHandler({ verbose }));
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
