/**
 * Minimal logger shape used by the library modules.
 * Library code stays silent unless a caller passes one in.
 */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};

/**
 * Logger that writes everything to stderr, for CLI commands that keep
 * stdout for data.
 */
export function stderrLogger(tag: string, verbose = false): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => {
      if (verbose) console.error(prefix, ...args);
    },
    info: (...args) => console.error(prefix, ...args),
    warn: (...args) => console.error(prefix, 'Warning:', ...args),
  };
}
