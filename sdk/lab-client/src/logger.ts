export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const noop = (): void => undefined;

/** Wraps `sink` so debug output only goes through when `verbose` is on. */
export function createLogger(sink: Logger, verbose: boolean): Logger {
  return {
    debug: verbose ? (message, ...args) => sink.debug(message, ...args) : noop,
    info: (message, ...args) => sink.info(message, ...args),
    warn: (message, ...args) => sink.warn(message, ...args),
    error: (message, ...args) => sink.error(message, ...args)
  };
}
