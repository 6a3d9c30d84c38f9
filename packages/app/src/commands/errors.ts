/**
 * Error handling for CLI commands
 *
 * Provides friendly error messages and structured error codes for
 * command failures, and maps market-data errors onto them.
 */

import {
  isEmptyInputError,
  isMarketDataError,
  isNoDataInRangeError,
  isNoReferenceDataError,
  isProviderUnavailableError,
  isQueryFailedError,
  isUnrecognizedFormatError,
} from '@ashare/contracts';

/**
 * Command error codes
 */
export enum ErrorCode {
  /** Invalid command arguments */
  INVALID_ARGS = 'INVALID_ARGS',
  /** Configuration or watchlist file could not be loaded */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Login failed or the provider rejected a query */
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  /** The query succeeded but returned nothing */
  MISSING_DATA = 'MISSING_DATA',
  /** CSV export failed */
  EXPORT_ERROR = 'EXPORT_ERROR',
  /** Internal command error */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Friendly error messages for each error code
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_ARGS]: 'Invalid command arguments provided',
  [ErrorCode.CONFIG_ERROR]: 'Failed to load configuration',
  [ErrorCode.PROVIDER_ERROR]: 'Failed to fetch market data from provider',
  [ErrorCode.MISSING_DATA]: 'Required data not available',
  [ErrorCode.EXPORT_ERROR]: 'Failed to export data',
  [ErrorCode.INTERNAL_ERROR]: 'Internal command error',
};

export interface CommandErrorOptions {
  context?: Record<string, unknown>;
  cause?: Error;
  /** Extra lines shown under the message, e.g. accepted input formats */
  hints?: readonly string[];
}

/**
 * Command error class
 *
 * Extends Error with structured error codes and context.
 */
export class CommandError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown> | undefined;
  override readonly cause: Error | undefined;
  readonly hints: readonly string[];

  constructor(code: ErrorCode, message?: string, options: CommandErrorOptions = {}) {
    super(message || ERROR_MESSAGES[code]);

    this.name = 'CommandError';
    this.code = code;
    this.context = options.context;
    this.cause = options.cause;
    this.hints = options.hints ?? [];

    Error.captureStackTrace(this, CommandError);
  }

  /**
   * Format error for display
   */
  format(verbose: boolean = false): string {
    const lines: string[] = [`Error: ${this.message}`];

    for (const hint of this.hints) {
      lines.push(`  ${hint}`);
    }

    if (verbose) {
      lines.push(`Code: ${this.code}`);

      if (this.context && Object.keys(this.context).length > 0) {
        lines.push('Context:');
        for (const [key, value] of Object.entries(this.context)) {
          lines.push(`  ${key}: ${JSON.stringify(value)}`);
        }
      }

      if (this.cause) {
        lines.push('Caused by:');
        lines.push(`  ${this.cause.stack ?? this.cause.message}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Convert error to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }
}

/**
 * Create a friendly error message from any error
 */
export function formatCommandError(error: unknown, verbose: boolean = false): string {
  if (error instanceof CommandError) {
    return error.format(verbose);
  }

  if (error instanceof Error) {
    const lines: string[] = [`Error: ${error.message}`];

    if (verbose && error.stack) {
      lines.push('Stack trace:');
      lines.push(error.stack);
    }

    return lines.join('\n');
  }

  return `Error: ${String(error)}`;
}

/**
 * Wrap an error with command error context
 *
 * Market-data errors keep their own message; the code follows the kind:
 * ticker input errors → INVALID_ARGS, provider and query failures →
 * PROVIDER_ERROR, empty results → MISSING_DATA.
 */
export function wrapError(
  error: unknown,
  fallback: ErrorCode = ErrorCode.INTERNAL_ERROR,
  context?: Record<string, unknown>
): CommandError {
  if (error instanceof CommandError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));

  if (isEmptyInputError(error) || isUnrecognizedFormatError(error)) {
    return new CommandError(ErrorCode.INVALID_ARGS, error.message, { context: { ...error.data, ...context }, cause });
  }

  if (isProviderUnavailableError(error) || isQueryFailedError(error)) {
    return new CommandError(ErrorCode.PROVIDER_ERROR, error.message, { context: { ...error.data, ...context }, cause });
  }

  if (isNoDataInRangeError(error) || isNoReferenceDataError(error)) {
    return new CommandError(ErrorCode.MISSING_DATA, error.message, { context: { ...error.data, ...context }, cause });
  }

  if (isMarketDataError(error)) {
    return new CommandError(fallback, error.message, { context: { ...error.data, ...context }, cause });
  }

  return new CommandError(fallback, ERROR_MESSAGES[fallback], { context, cause });
}

/**
 * Codes that signal an environmental outcome (provider down, empty result)
 * rather than a defect; they exit 0 unless strict exit is on.
 */
const SOFT_FAILURES: ReadonlySet<ErrorCode> = new Set([ErrorCode.PROVIDER_ERROR, ErrorCode.MISSING_DATA]);

/**
 * Process exit code for a failed command
 */
export function exitCodeFor(error: CommandError, strict: boolean): number {
  if (error.code === ErrorCode.INVALID_ARGS) {
    return 2;
  }
  if (SOFT_FAILURES.has(error.code)) {
    return strict ? 1 : 0;
  }
  return 1;
}
