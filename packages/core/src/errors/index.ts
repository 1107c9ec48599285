import { TangleErrorCode } from './codes.js';

// Re-export for consumers
export { TangleErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Base error class for all tangle-specific errors
 */
export class TangleError extends Error {
  constructor(
    message: string,
    public readonly code: TangleErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = true
  ) {
    super(message);
    this.name = 'TangleError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for machine-readable reports
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }

  /**
   * Check if this error is recoverable
   */
  isRecoverable(): boolean {
    return this.recoverable;
  }
}

/**
 * Configuration errors (bad config file, invalid threshold). Fatal before analysis.
 */
export class ConfigError extends TangleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, TangleErrorCode.CONFIG_INVALID, context, 'high', false);
    this.name = 'ConfigError';
  }
}

/**
 * A function whose source does not parse. The unit is skipped and reported;
 * the batch continues.
 */
export class ParseError extends TangleError {
  constructor(
    message: string,
    public readonly file: string,
    public readonly line: number,
    context?: Record<string, unknown>
  ) {
    super(message, TangleErrorCode.PARSE_FAILED, { ...context, file, line }, 'low', true);
    this.name = 'ParseError';
  }
}

/**
 * No analyzable function was found in the input.
 */
export class EmptyInputError extends TangleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, TangleErrorCode.NOTHING_TO_ANALYZE, context, 'medium', false);
    this.name = 'EmptyInputError';
  }
}

/**
 * Type guard to check if an error is a TangleError
 */
export function isTangleError(error: unknown): error is TangleError {
  return error instanceof TangleError;
}

/**
 * Extract error message from unknown error type
 * @param error - Unknown error object
 * @returns Error message string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
