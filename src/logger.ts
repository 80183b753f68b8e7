/**
 * rowscroll - Logger
 * Console logging with a common prefix; debug output is off unless enabled
 */

import { LOG_PREFIX } from "./constants";

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  /** Emit debug lines (default: false) */
  debug?: boolean;

  /** Prepended to every line (default: "[rowscroll]") */
  prefix?: string;
}

/**
 * Create a logger writing to the console.
 * Meta values are passed through untouched so the console can inspect them.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const { debug = false, prefix = LOG_PREFIX } = options;

  const write = (
    sink: (...args: unknown[]) => void,
    message: string,
    meta: unknown,
  ): void => {
    if (meta === undefined) {
      sink(`${prefix} ${message}`);
    } else {
      sink(`${prefix} ${message}`, meta);
    }
  };

  return {
    debug: (message, meta) => {
      if (debug) write(console.debug, message, meta);
    },
    info: (message, meta) => write(console.info, message, meta),
    warn: (message, meta) => write(console.warn, message, meta),
    error: (message, error) => write(console.error, message, error),
  };
};
