/**
 * Logger interface for analysis runs.
 * Keeps the engine free of console calls so reports on stdout stay clean.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Console logger that writes every level to stderr, leaving stdout to the
 * report itself.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.error(`[info] ${message}`),
  warning: (message: string) => console.error(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.error(`[debug] ${message}`),
};

const noop = (): void => undefined;

/** Logger that discards everything (tests, `--format json` piping) */
export const silentLogger: Logger = {
  info: noop,
  warning: noop,
  error: noop,
  debug: noop,
};

/**
 * Wrap a logger so `info` and `debug` only go through when verbose.
 * Warnings and errors always pass.
 */
export function createLogger(verbose: boolean, base: Logger = consoleLogger): Logger {
  if (verbose) return base;
  return {
    info: noop,
    warning: (message: string) => base.warning(message),
    error: (message: string) => base.error(message),
    debug: noop,
  };
}
