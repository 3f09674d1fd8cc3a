import { type LogLevel, type Logger, createLogger } from "vite";

export type { LogLevel, Logger };

export const LOG_PREFIX = "[scaling-book]";

const levels: readonly LogLevel[] = ["info", "warn", "error", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return levels.some((level) => level === value);
}

const withPrefix = (msg: string): string =>
  msg.startsWith(LOG_PREFIX) ? msg : `${LOG_PREFIX} ${msg}`;

/**
 * vite's logger, with every line starting with the project prefix.
 * vite only prints its own `prefix` next to a timestamp.
 */
export function createBookLogger(level: LogLevel = "info"): Logger {
  const logger = createLogger(level, { prefix: LOG_PREFIX, allowClearScreen: false });
  return {
    info: (msg, options) => logger.info(withPrefix(msg), options),
    warn: (msg, options) => logger.warn(withPrefix(msg), options),
    warnOnce: (msg, options) => logger.warnOnce(withPrefix(msg), options),
    error: (msg, options) => logger.error(withPrefix(msg), options),
    clearScreen: (type) => logger.clearScreen(type),
    hasErrorLogged: (error) => logger.hasErrorLogged(error),
    get hasWarned() {
      return logger.hasWarned;
    },
  };
}
