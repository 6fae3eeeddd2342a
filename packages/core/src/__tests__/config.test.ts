import { describe, it, expect, afterEach, vi } from 'vitest';

import { configure, getConfig, getDefaultFlavor, resetConfig } from '../config';
import { UnsupportedFlavorError, ValidationError } from '../errors';
import { PostgreSQLFlavor } from '../flavor/postgresql-flavor';
import { consoleLogger } from '../logger';

import type { LogLevel } from '../logger';

describe('config', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should default to MySQL, console logging and warn level', () => {
    const config = getConfig();
    expect(config.defaultFlavor.name).toBe('mysql');
    expect(config.logger).toBe(consoleLogger);
    expect(config.logLevel).toBe('warn');
  });

  it('should set the default flavor by alias', () => {
    configure({ defaultFlavor: 'postgres' });
    expect(getDefaultFlavor().name).toBe('postgresql');
  });

  it('should set the default flavor by instance', () => {
    const flavor = new PostgreSQLFlavor();
    configure({ defaultFlavor: flavor });
    expect(getDefaultFlavor()).toBe(flavor);
  });

  it('should keep settings that are not given', () => {
    configure({ defaultFlavor: 'sqlite' });
    configure({ logLevel: 'error' });
    expect(getConfig().defaultFlavor.name).toBe('sqlite');
    expect(getConfig().logLevel).toBe('error');
  });

  it('should fail loudly on unknown flavors', () => {
    expect(() => configure({ defaultFlavor: 'oracle' })).toThrow(UnsupportedFlavorError);
    expect(getDefaultFlavor().name).toBe('mysql');
  });

  it('should reject unknown log levels', () => {
    const level: string = 'verbose';
    expect(() => configure({ logLevel: level as LogLevel })).toThrow(ValidationError);
    expect(getConfig().logLevel).toBe('warn');
  });

  it('should restore defaults', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    configure({ defaultFlavor: 'cql', logger, logLevel: 'debug' });
    resetConfig();
    expect(getConfig().defaultFlavor.name).toBe('mysql');
    expect(getConfig().logger).toBe(consoleLogger);
  });
});
