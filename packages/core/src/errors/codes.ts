/**
 * Error codes for all tangle-specific errors.
 * Used to identify error types programmatically.
 */
export enum TangleErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Analysis
  PARSE_FAILED = 'PARSE_FAILED',
  NOTHING_TO_ANALYZE = 'NOTHING_TO_ANALYZE',

  // File System
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',

  // Command line
  INVALID_INPUT = 'INVALID_INPUT',
}
