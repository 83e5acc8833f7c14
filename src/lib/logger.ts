import type { LogLevel } from "../config/index.js";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/** Console logger with a level threshold. Warnings and errors go to stderr. */
export function createLogger(level: LogLevel): Logger {
  const enabled = (l: LogLevel) => ORDER[l] >= ORDER[level];
  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.log(`DEBUG: ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(msg, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`WARN: ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`ERROR: ${msg}`, ...args);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
