/**
 * Command Error Handling
 *
 * Provides centralized error handling for CLI commands.
 * Commands throw, handleError prints and picks the exit code.
 */

import { printBlank, printRaw, colors } from './output';

/**
 * CLI Error codes, used as process exit codes
 */
export enum ErrorCode {
  // General errors (1-9)
  UNKNOWN = 1,

  // Configuration errors (10-19)
  PILLAR_NOT_FOUND = 10,
  PILLAR_INVALID = 11,
  PILLAR_KEY_NOT_FOUND = 12,

  // Generation errors (20-29)
  GENERATION_FAILED = 20,
  ENV_NOT_FOUND = 21,

  // Persistence errors (30-39)
  WRITE_FAILED = 30,

  // Validation errors (60-69)
  VALIDATION_FAILED = 60,
  INVALID_ARGUMENT = 61,
}

/**
 * Base CLI error class with structured information
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN,
    public readonly suggestion?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Create error from unknown thrown value
   */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): CLIError {
    if (error instanceof CLIError) {
      return error;
    }
    if (error instanceof Error) {
      return new CLIError(error.message, code, undefined, error);
    }
    return new CLIError(String(error), code);
  }
}

export class ConfigError extends CLIError {
  constructor(message: string, code: ErrorCode = ErrorCode.PILLAR_INVALID, suggestion?: string) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.VALIDATION_FAILED, suggestion);
    this.name = 'ValidationError';
  }
}

export class PersistenceError extends CLIError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, ErrorCode.WRITE_FAILED, 'Check that the configuration directory is writable', cause);
    this.name = 'PersistenceError';
  }
}

/**
 * Format error for display
 */
export function formatError(error: CLIError): string {
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${error.message}`));

  if (error.suggestion) {
    lines.push(colors.dim(`  → ${error.suggestion}`));
  }

  if (process.env.DEBUG && error.cause) {
    lines.push(colors.dim(`  Caused by: ${error.cause.message}`));
    if (error.cause.stack) {
      lines.push(colors.dim(error.cause.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Handle error and exit process
 * This is the ONLY place that should call process.exit for errors
 */
export function handleError(error: unknown): never {
  const cliError = CLIError.from(error);

  printBlank();
  printRaw(formatError(cliError));
  printBlank();

  process.exit(cliError.code);
}

/**
 * Type for async command action handlers
 */
export type CommandAction<T extends unknown[] = unknown[]> = (...args: T) => Promise<void>;

/**
 * Wrap a command action with error handling
 *
 * Usage:
 * ```typescript
 * .action(withErrorHandler(async (options) => {
 *   if (!valid) throw new ValidationError('Invalid input');
 * }))
 * ```
 */
export function withErrorHandler<T extends unknown[]>(
  action: CommandAction<T>
): CommandAction<T> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
