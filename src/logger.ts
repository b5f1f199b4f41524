/**
 * Minimal logging seam for the cache core. The server wires the console
 * implementation; tests pass {@link silentLogger}.
 *
 * All output goes to stderr so stdout stays reserved for the stdio transport.
 */
export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  /** Emitted only in verbose mode. */
  debug(message: string, ...details: unknown[]): void;
}

export function createConsoleLogger(verbose = false, prefix = "[MCP]"): Logger {
  return {
    info: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    debug: (message, ...details) => {
      if (verbose) console.error(`${prefix}[verbose] ${message}`, ...details);
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};
