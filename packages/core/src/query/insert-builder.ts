/**
 * Insert Query Builder
 *
 * Fluent builder for INSERT, INSERT IGNORE and REPLACE. Clauses are always
 * rendered in the same order, whatever order they were configured in:
 *
 *   <verb> INTO <table> (<cols>) VALUES (<row>), (<row>)
 *
 * `sql()` adds a raw fragment right after the clause configured last, which
 * makes it sensitive to call order.
 *
 * @example
 * ```typescript
 * const { sql, args } = insertInto('users')
 *   .cols('name', 'email')
 *   .values('Ada', 'ada@example.com')
 *   .values('Grace', 'grace@example.com')
 *   .build();
 * // sql:  'INSERT INTO users (name, email) VALUES (?, ?), (?, ?)'
 * // args: ['Ada', 'ada@example.com', 'Grace', 'grace@example.com']
 * ```
 */

import { getDefaultFlavor } from '../config';
import { BUILDER_DEFAULTS } from '../constants';
import { escape, escapeAll } from '../utils/escape';
import { StringBuilder } from '../utils/string-builder';
import { Args } from './args';
import { Injection } from './injection';

import type { SQLFlavor } from '../flavor/sql-flavor';
import type { RecordMapper } from '../mapper/record-mapper';
import type { Builder, BuiltSQL } from './builder';

/**
 * Checkpoints of the INSERT render order, in order
 */
export const InsertMarker = {
  Init: 0,
  AfterInsertInto: 1,
  AfterCols: 2,
  AfterValues: 3,
} as const;

export type InsertMarker = (typeof InsertMarker)[keyof typeof InsertMarker];

export class InsertBuilder implements Builder {
  private verb: string = BUILDER_DEFAULTS.INSERT_VERB;
  private conflictClause = '';
  private table = '';
  private columns: string[] = [];
  private readonly rows: string[][] = [];

  private readonly args: Args;
  private readonly injection = new Injection<InsertMarker>();
  private marker: InsertMarker = InsertMarker.Init;

  constructor(flavor: SQLFlavor = getDefaultFlavor()) {
    this.args = new Args(flavor);
  }

  get flavor(): SQLFlavor {
    return this.args.flavor;
  }

  /**
   * Set table to insert into
   */
  insertInto(table: string): this {
    this.verb = BUILDER_DEFAULTS.INSERT_VERB;
    this.conflictClause = '';
    return this.into(table);
  }

  /**
   * Set table and ignore rows that collide with existing keys.
   * The construct used depends on the flavor at the time of the call.
   */
  insertIgnoreInto(table: string): this {
    const strategy = this.args.flavor.insertIgnore();
    this.verb = strategy.verb;
    this.conflictClause = strategy.kind === 'conflict-clause' ? strategy.clause : '';
    return this.into(table);
  }

  /**
   * Set table and use REPLACE (MySQL/SQLite extension)
   */
  replaceInto(table: string): this {
    this.verb = BUILDER_DEFAULTS.REPLACE_VERB;
    this.conflictClause = '';
    return this.into(table);
  }

  /**
   * Set column names
   */
  cols(...columns: string[]): this {
    this.columns = escapeAll(...columns);
    this.advance(InsertMarker.AfterCols);
    return this;
  }

  /**
   * Add one row of values
   */
  values(...values: unknown[]): this {
    this.rows.push(values.map((value) => this.args.add(value)));
    this.advance(InsertMarker.AfterValues);
    return this;
  }

  /**
   * Set columns and add a row from a record; primary-key fields are skipped
   */
  insertItem<T>(item: T, mapper: RecordMapper<T>): this {
    const fields = mapper(item).filter((entry) => !entry.isPrimaryKey);
    return this.cols(...fields.map((entry) => entry.column)).values(
      ...fields.map((entry) => entry.value),
    );
  }

  /**
   * Register a value and return its placeholder, for use inside `sql()`
   */
  var(value: unknown): string {
    return this.args.add(value);
  }

  /**
   * Add a raw SQL fragment after the clause configured last
   */
  sql(fragment: string): this {
    this.injection.sql(this.marker, fragment);
    return this;
  }

  /**
   * Change the flavor used by `build()`; returns the previous one
   */
  setFlavor(flavor: SQLFlavor): SQLFlavor {
    const old = this.args.flavor;
    this.args.flavor = flavor;
    return old;
  }

  build(): BuiltSQL {
    return this.buildWithFlavor(this.args.flavor);
  }

  buildWithFlavor(flavor: SQLFlavor, ...initialArgs: unknown[]): BuiltSQL {
    return this.args.compileWithFlavor(this.template(), flavor, ...initialArgs);
  }

  interpolate(flavor: SQLFlavor = this.args.flavor): string {
    return this.args.interpolateWithFlavor(this.template(), flavor);
  }

  toString(): string {
    return this.build().sql;
  }

  // ============ Private Methods ============

  private into(table: string): this {
    this.table = escape(table);
    this.advance(InsertMarker.AfterInsertInto);
    return this;
  }

  // The cursor only moves forward
  private advance(marker: InsertMarker): void {
    if (marker > this.marker) {
      this.marker = marker;
    }
  }

  private template(): string {
    const buf = new StringBuilder();
    this.injection.writeTo(buf, InsertMarker.Init);

    if (this.table.length > 0) {
      buf.writeLeading(this.verb);
      buf.write(' INTO ');
      buf.write(this.table);
    }

    this.injection.writeTo(buf, InsertMarker.AfterInsertInto);

    if (this.columns.length > 0) {
      buf.writeLeading('(');
      buf.writeJoined(this.columns, ', ');
      buf.write(')');
    }

    this.injection.writeTo(buf, InsertMarker.AfterCols);

    if (this.rows.length > 0) {
      buf.writeLeading('VALUES ');
      buf.writeJoined(
        this.rows.map((row) => `(${row.join(', ')})`),
        ', ',
      );
    }

    // Conflict clause goes before any fragment written after the values
    if (this.conflictClause.length > 0) {
      buf.writeLeading(this.conflictClause);
    }

    this.injection.writeTo(buf, InsertMarker.AfterValues);

    return buf.toString();
  }
}

/**
 * Create an INSERT builder; uses the configured default flavor when none is given
 */
export function newInsertBuilder(flavor?: SQLFlavor): InsertBuilder {
  return new InsertBuilder(flavor);
}

export function insertInto(table: string): InsertBuilder {
  return newInsertBuilder().insertInto(table);
}

export function insertIgnoreInto(table: string): InsertBuilder {
  return newInsertBuilder().insertIgnoreInto(table);
}

export function replaceInto(table: string): InsertBuilder {
  return newInsertBuilder().replaceInto(table);
}
