/**
 * Minimal scoped logger.
 *
 * Components receive a {@link Logger} by injection and never reach for
 * `console` directly. The console implementation prefixes every line with
 * `[Scope]` and only prints debug/info output when debug logging is on.
 */

/** Structured fields appended to a log line. */
export type LogFields = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Derive a logger whose scope is `parent:scope`. */
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  readonly scope?: string;
  /** Print debug and info lines. Defaults to false. */
  readonly debug?: boolean;
}

/**
 * Create a logger writing to the console.
 *
 * @param options - Scope prefix and debug switch.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const scope = options.scope ?? "ClientCore";
  const verbose = options.debug ?? false;

  const format = (message: string, fields?: LogFields): string => {
    const prefix = `[${scope}] ${message}`;
    if (fields === undefined || Object.keys(fields).length === 0) {
      return prefix;
    }
    return `${prefix} ${JSON.stringify(fields)}`;
  };

  return {
    debug(message, fields) {
      if (verbose) console.debug(format(message, fields));
    },
    info(message, fields) {
      if (verbose) console.log(format(message, fields));
    },
    warn(message, fields) {
      console.warn(format(message, fields));
    },
    error(message, fields) {
      console.error(format(message, fields));
    },
    child(childScope) {
      return createConsoleLogger({ scope: `${scope}:${childScope}`, debug: verbose });
    },
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
