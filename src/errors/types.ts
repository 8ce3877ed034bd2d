/**
 * Error types for the cbi CLI and HTTP API
 *
 * Every error a user can act on carries a recovery hint and an exit code.
 */

/**
 * Base class for all user-facing errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Process exit code (1-255) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps instanceof working on subclasses after compilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * A file or directory that does not exist. Exit code 3.
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Invalid TOML, unknown keys, or values that fail validation. Exit code 2.
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: cbi config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Missing API key for an embedding or chat provider. Exit code 4.
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (or add it to .env)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Wraps SQLite failures. Exit code 5.
 */
export class DatabaseError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, 'Rebuild the index with: cbi index --force', 5);
    this.name = 'DatabaseError';
    // Error.cause: the underlying driver error
    this.cause = cause;
  }
}

/**
 * Input that failed validation, with one entry per problem. Exit code 1.
 */
export class ValidationError extends CLIError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * The assistant was used before its index was built or loaded. Exit code 6.
 */
export class NotInitializedError extends CLIError {
  constructor(what = 'Codebase assistant') {
    super(`${what} is not initialized`, 'Run: cbi index  to build the index first', 6);
    this.name = 'NotInitializedError';
  }
}

/**
 * An MCP server in [mcp.connections] could not be reached or listed. Exit code 7.
 */
export class ToolServerError extends CLIError {
  constructor(server: string, reason: string) {
    super(
      `Failed to load MCP tools from "${server}": ${reason}`,
      'Check the [mcp.connections] entries in config.toml',
      7
    );
    this.name = 'ToolServerError';
  }
}
