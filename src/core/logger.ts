/**
 * Scoped console logging.
 *
 * Every line is prefixed with `[odata-literal:<scope>]`. Debug lines are only
 * written when the logger is verbose.
 */

export interface Logger {
  readonly verbose: boolean;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Where log lines go. `console` satisfies this. */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const { verbose = false, sink = console } = options;
  const prefix = `[odata-literal:${scope}]`;

  return {
    verbose,
    debug(message) {
      if (verbose) sink.log(`${prefix} ${message}`);
    },
    info(message) {
      sink.log(`${prefix} ${message}`);
    },
    warn(message) {
      sink.warn(`${prefix} ${message}`);
    },
    error(message) {
      sink.error(`${prefix} ${message}`);
    },
  };
}
