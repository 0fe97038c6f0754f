export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const PREFIX = "[geohash-viewport]";

/**
 * Console-backed logger. Debug output is dropped unless `debug` is set.
 */
export function createConsoleLogger({ debug = false }: { debug?: boolean } = {}): Logger {
  const write =
    (fn: (...args: unknown[]) => void) =>
    (message: string, context?: Record<string, unknown>) => {
      if (context) fn(`${PREFIX} ${message}`, context);
      else fn(`${PREFIX} ${message}`);
    };

  return {
    debug: debug ? write(console.debug) : () => {},
    info: write(console.info),
    warn: write(console.warn),
    error: write(console.error),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
