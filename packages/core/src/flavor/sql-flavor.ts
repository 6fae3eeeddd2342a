/**
 * SQL Flavor Base Class
 *
 * A flavor is the dialect policy of a compiled statement: placeholder
 * syntax, identifier quoting, literal escaping and the dialect variants of
 * statements that have no single standard form. Flavors hold no state, so a
 * single instance is shared by every builder using it.
 */

import { ValidationError } from '../errors';
import { getLogger } from '../logger';

export type FlavorName = 'mysql' | 'postgresql' | 'sqlite' | 'sqlserver' | 'clickhouse' | 'cql';

/**
 * How a flavor expresses "insert, ignore duplicates"
 *
 * - `verb`: the verb itself changes (`INSERT IGNORE`, `INSERT OR IGNORE`)
 * - `conflict-clause`: plain verb plus a clause written after the values
 * - `unsupported`: the dialect has no such construct; plain verb is used
 */
export type InsertIgnoreStrategy =
  | { kind: 'verb'; verb: string }
  | { kind: 'conflict-clause'; verb: string; clause: string }
  | { kind: 'unsupported'; verb: string };

export interface FlavorConfig {
  /** Opening and closing identifier quote (e.g. ` for MySQL, [ ] for SQL Server) */
  identifierQuote: { open: string; close: string };
  /** Whether placeholders carry their ordinal ($1, @p1) rather than being bare (?) */
  numberedPlaceholders: boolean;
  /** Boolean literal values */
  booleanLiterals: { true: string; false: string };
  insertIgnore: InsertIgnoreStrategy;
}

export abstract class SQLFlavor {
  abstract readonly name: FlavorName;
  abstract readonly config: FlavorConfig;

  /**
   * Placeholder for the parameter at a 1-based ordinal
   * MySQL: ?
   * PostgreSQL: $1, $2, $3...
   */
  abstract placeholder(ordinal: number): string;

  get numberedPlaceholders(): boolean {
    return this.config.numberedPlaceholders;
  }

  /**
   * Quote an identifier (table name, column name)
   */
  quoteIdentifier(identifier: string): string {
    const { open, close } = this.config.identifierQuote;
    // Handle schema.table format
    return identifier
      .split('.')
      .map((part) => `${open}${part.replaceAll(close, close + close)}${close}`)
      .join('.');
  }

  insertIgnore(): InsertIgnoreStrategy {
    const strategy = this.config.insertIgnore;
    if (strategy.kind === 'unsupported') {
      getLogger().warn(`${this.name} cannot ignore duplicate rows, using plain ${strategy.verb}`);
    }
    return strategy;
  }

  /**
   * Render a value as an SQL literal
   */
  escapeValue(value: unknown): string {
    if (value === null || value === undefined) {
      return 'NULL';
    }

    if (typeof value === 'boolean') {
      return value ? this.config.booleanLiterals.true : this.config.booleanLiterals.false;
    }

    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new ValidationError(`Cannot write ${value} as an SQL literal`);
      }
      return String(value);
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (value instanceof Date) {
      return this.escapeDate(value);
    }

    if (typeof value === 'string') {
      return this.escapeString(value);
    }

    if (Buffer.isBuffer(value)) {
      return this.escapeBinary(value);
    }

    if (Array.isArray(value)) {
      return this.escapeArray(value);
    }

    if (typeof value === 'function' || typeof value === 'symbol') {
      throw new ValidationError(`Cannot write a ${typeof value} as an SQL literal`);
    }

    return this.escapeObject(value);
  }

  toString(): string {
    return this.name;
  }

  protected escapeString(value: string): string {
    return `'${value.replaceAll("'", "''")}'`;
  }

  protected escapeDate(value: Date): string {
    return `'${value.toISOString().slice(0, 19).replace('T', ' ')}'`;
  }

  protected escapeBinary(value: Buffer): string {
    return `X'${value.toString('hex')}'`;
  }

  // Arrays and objects - serialize as JSON
  protected escapeArray(values: unknown[]): string {
    return this.escapeString(this.toJson(values));
  }

  protected escapeObject(value: unknown): string {
    return this.escapeString(this.toJson(value));
  }

  protected toJson(value: unknown): string {
    let json: string | undefined;
    try {
      json = JSON.stringify(value);
    } catch (error) {
      throw new ValidationError(
        `Cannot write value as JSON: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        error instanceof Error ? error : undefined,
      );
    }
    if (json === undefined) {
      throw new ValidationError('Cannot write value as JSON');
    }
    return json;
  }
}
