/**
 * SQL Flavors
 *
 * Dialect policies consumed by the argument compiler and the statement
 * builders.
 *
 * @module flavor
 */

export {
  SQLFlavor,
  type FlavorConfig,
  type FlavorName,
  type InsertIgnoreStrategy,
} from './sql-flavor';
export { MySQLFlavor } from './mysql-flavor';
export { PostgreSQLFlavor } from './postgresql-flavor';
export { SQLiteFlavor } from './sqlite-flavor';
export { SQLServerFlavor } from './sqlserver-flavor';
export { ClickHouseFlavor } from './clickhouse-flavor';
export { CQLFlavor } from './cql-flavor';
export { FlavorFactory, type FlavorAlias } from './flavor-factory';
