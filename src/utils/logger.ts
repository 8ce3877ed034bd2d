/**
 * Logger Interface for Library Code
 *
 * Library code (loader, assistant, server) takes a Logger by injection.
 * The CLI passes its CommandContext, which satisfies this interface; tests
 * pass silentLogger.
 */

export interface Logger {
  /** Progress and status messages */
  info: (message: string) => void;
  /** Recoverable problems (skipped file, fallback chunk) */
  warn: (message: string) => void;
  /** Verbose diagnostics; not every context wires it */
  debug?: (message: string) => void;
}

/**
 * Default logger when none is injected. Everything goes to stderr so
 * stdout stays clean for command output.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.error(message),
  warn: (message: string) => console.warn(message),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};
