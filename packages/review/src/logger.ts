/**
 * Logger interface for review operations.
 * Decouples the pipeline from any particular output so the CLI can route
 * messages through its spinner and tests can silence them.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Simple console-based logger.
 *
 * WARNING: writes info to stdout. When stdout carries a machine-readable
 * report (`--format json`), pass a logger that writes to stderr instead.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`[info] ${message}`),
  warning: (message: string) => console.warn(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.debug(`[debug] ${message}`),
};

/**
 * Logger that writes everything to stderr, leaving stdout for the report.
 */
export const stderrLogger: Logger = {
  info: (message: string) => console.error(`[info] ${message}`),
  warning: (message: string) => console.error(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.error(`[debug] ${message}`),
};
