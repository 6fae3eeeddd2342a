/**
 * Logger
 *
 * Minimal logging facade used across the builders. The default sink is the
 * console; messages below the configured level are dropped.
 *
 * @example
 * ```typescript
 * configure({ logLevel: 'debug' });
 * configure({ logger: pinoInstance });
 * ```
 */

import { LOGGING_DEFAULTS } from './constants';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`${LOGGING_DEFAULTS.PREFIX} ${msg}`, ...args),
  info: (msg, ...args) => console.info(`${LOGGING_DEFAULTS.PREFIX} ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`${LOGGING_DEFAULTS.PREFIX} ${msg}`, ...args),
  error: (msg, ...args) => console.error(`${LOGGING_DEFAULTS.PREFIX} ${msg}`, ...args),
};
/* eslint-enable no-console */

let sink: Logger = consoleLogger;
let threshold: LogLevel = LOGGING_DEFAULTS.LEVEL;

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function setLogger(logger: Logger): void {
  sink = logger;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

const filtered: Logger = {
  debug: (msg, ...args) => {
    if (enabled('debug')) sink.debug(msg, ...args);
  },
  info: (msg, ...args) => {
    if (enabled('info')) sink.info(msg, ...args);
  },
  warn: (msg, ...args) => {
    if (enabled('warn')) sink.warn(msg, ...args);
  },
  error: (msg, ...args) => {
    if (enabled('error')) sink.error(msg, ...args);
  },
};

/**
 * Logger honoring the configured sink and level
 */
export function getLogger(): Logger {
  return filtered;
}

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength: number = LOGGING_DEFAULTS.MAX_SQL_LENGTH): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}
