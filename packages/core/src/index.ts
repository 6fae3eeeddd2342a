export * from './constants';
export * from './errors';
export * from './flavor';
export * from './mapper';
export * from './query';
export { configure, getConfig, getDefaultFlavor, resetConfig } from './config';
export type { ConfigureOptions, SqlWeaveConfig } from './config';
export { consoleLogger, getLogger, type LogLevel, type Logger } from './logger';
export { escape, escapeAll } from './utils/escape';
