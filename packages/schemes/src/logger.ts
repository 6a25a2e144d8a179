/**
 * Scoped console logging. Messages are prefixed `[refold:<scope>]`;
 * `debug` prints only when `config.get("debug")` is on.
 */

import { config } from "./config.js";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[refold:${scope}]`;
  return {
    debug: (message, ...details) => {
      if (config.get("debug")) console.log(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => console.log(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
  };
}
