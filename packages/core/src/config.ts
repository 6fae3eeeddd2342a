/**
 * Process-wide configuration
 *
 * @example
 * ```typescript
 * configure({ defaultFlavor: 'postgresql', logLevel: 'debug' });
 * insertInto('users').cols('name').values('Ada').build();
 * // { sql: 'INSERT INTO users (name) VALUES ($1)', args: ['Ada'] }
 * ```
 */

import { BUILDER_DEFAULTS, LOGGING_DEFAULTS } from './constants';
import { ValidationError } from './errors';
import { FlavorFactory } from './flavor/flavor-factory';
import { consoleLogger, isLogLevel, setLogger, setLogLevel } from './logger';

import type { SQLFlavor } from './flavor/sql-flavor';
import type { LogLevel, Logger } from './logger';

export interface SqlWeaveConfig {
  /** Flavor used by builders created without one */
  defaultFlavor: SQLFlavor;
  logger: Logger;
  logLevel: LogLevel;
}

export interface ConfigureOptions {
  /** Flavor instance, name or alias (e.g. 'postgres') */
  defaultFlavor?: SQLFlavor | string;
  logger?: Logger;
  logLevel?: LogLevel;
}

function defaults(): SqlWeaveConfig {
  return {
    defaultFlavor: FlavorFactory.getFlavor(BUILDER_DEFAULTS.FLAVOR),
    logger: consoleLogger,
    logLevel: LOGGING_DEFAULTS.LEVEL,
  };
}

let current: SqlWeaveConfig | undefined;

export function getConfig(): SqlWeaveConfig {
  if (!current) {
    current = defaults();
  }
  return current;
}

export function configure(options: ConfigureOptions): SqlWeaveConfig {
  const next = { ...getConfig() };

  if (options.defaultFlavor !== undefined) {
    next.defaultFlavor =
      typeof options.defaultFlavor === 'string'
        ? FlavorFactory.getFlavor(options.defaultFlavor)
        : options.defaultFlavor;
  }

  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new ValidationError(`Unknown log level: ${String(options.logLevel)}`, 'logLevel');
    }
    next.logLevel = options.logLevel;
  }

  if (options.logger !== undefined) {
    next.logger = options.logger;
  }

  apply(next);
  return next;
}

/**
 * Restore defaults (useful for testing)
 */
export function resetConfig(): void {
  apply(defaults());
}

export function getDefaultFlavor(): SQLFlavor {
  return getConfig().defaultFlavor;
}

function apply(config: SqlWeaveConfig): void {
  current = config;
  setLogger(config.logger);
  setLogLevel(config.logLevel);
}
