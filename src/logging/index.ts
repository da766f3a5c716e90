/**
 * Logging Module
 *
 * Every component takes a Logger so runs stay observable and tests can
 * capture or silence output. The default writes one JSON object per line.
 */

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

type Level = keyof Logger;

function format(level: Level, module: string, message: string, context?: Record<string, unknown>): string {
  return JSON.stringify({ ...context, level, module, message, timestamp: new Date().toISOString() });
}

/**
 * Create a JSON-line console logger tagged with a module name.
 * Debug lines are only written when `verbose` is set.
 */
export function createConsoleLogger(module: string, verbose: boolean = false): Logger {
  return {
    info: (message, context) => {
      console.log(format('info', module, message, context));
    },
    warn: (message, context) => {
      console.warn(format('warn', module, message, context));
    },
    error: (message, context) => {
      console.error(format('error', module, message, context));
    },
    debug: (message, context) => {
      if (verbose) {
        console.debug(format('debug', module, message, context));
      }
    },
  };
}

export const defaultLogger: Logger = createConsoleLogger('boss-wiki');

export const silentLogger: Logger = {
  info: () => { /* no-op */ },
  warn: () => { /* no-op */ },
  error: () => { /* no-op */ },
  debug: () => { /* no-op */ },
};
