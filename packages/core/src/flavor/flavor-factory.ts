/**
 * Flavor Factory
 *
 * Resolves flavor names (and their common aliases) to shared flavor
 * instances. The set of flavors is closed.
 */

import { ClickHouseFlavor } from './clickhouse-flavor';
import { CQLFlavor } from './cql-flavor';
import { MySQLFlavor } from './mysql-flavor';
import { PostgreSQLFlavor } from './postgresql-flavor';
import { SQLiteFlavor } from './sqlite-flavor';
import { SQLServerFlavor } from './sqlserver-flavor';
import { UnsupportedFlavorError } from '../errors';

import type { FlavorName, SQLFlavor } from './sql-flavor';

export type FlavorAlias = FlavorName | 'mariadb' | 'postgres' | 'mssql' | 'cassandra';

const FLAVOR_ALIASES: Record<FlavorAlias, FlavorName> = {
  mysql: 'mysql',
  mariadb: 'mysql',
  postgresql: 'postgresql',
  postgres: 'postgresql',
  sqlite: 'sqlite',
  sqlserver: 'sqlserver',
  mssql: 'sqlserver',
  clickhouse: 'clickhouse',
  cql: 'cql',
  cassandra: 'cql',
};

const flavorCache = new Map<FlavorName, SQLFlavor>();

export class FlavorFactory {
  /**
   * Get flavor for a name or alias (cached)
   */
  static getFlavor(name: string): SQLFlavor {
    const normalized = this.normalizeName(name);

    const cached = flavorCache.get(normalized);
    if (cached) {
      return cached;
    }

    const flavor = this.createFlavor(normalized);
    flavorCache.set(normalized, flavor);
    return flavor;
  }

  /**
   * Create new flavor instance (not cached)
   */
  static createFlavor(name: string): SQLFlavor {
    const normalized = this.normalizeName(name);

    switch (normalized) {
      case 'mysql': {
        return new MySQLFlavor();
      }
      case 'postgresql': {
        return new PostgreSQLFlavor();
      }
      case 'sqlite': {
        return new SQLiteFlavor();
      }
      case 'sqlserver': {
        return new SQLServerFlavor();
      }
      case 'clickhouse': {
        return new ClickHouseFlavor();
      }
      case 'cql': {
        return new CQLFlavor();
      }
    }
  }

  /**
   * Check if a flavor name or alias is supported
   */
  static isSupported(name: string): name is FlavorAlias {
    return Object.prototype.hasOwnProperty.call(FLAVOR_ALIASES, name);
  }

  /**
   * Clear flavor cache (useful for testing)
   */
  static clearCache(): void {
    flavorCache.clear();
  }

  private static normalizeName(name: string): FlavorName {
    if (!this.isSupported(name)) {
      throw new UnsupportedFlavorError(name);
    }
    return FLAVOR_ALIASES[name];
  }
}
