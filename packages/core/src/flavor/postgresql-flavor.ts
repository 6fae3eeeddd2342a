/**
 * PostgreSQL Flavor
 *
 * - Double quote (") identifier quoting
 * - Numbered ($1, $2) parameter placeholders
 * - INSERT ... ON CONFLICT DO NOTHING
 */

import { SQLFlavor } from './sql-flavor';

import type { FlavorConfig } from './sql-flavor';

export class PostgreSQLFlavor extends SQLFlavor {
  readonly name = 'postgresql';

  readonly config: FlavorConfig = {
    identifierQuote: { open: '"', close: '"' },
    numberedPlaceholders: true,
    booleanLiterals: { true: 'TRUE', false: 'FALSE' },
    insertIgnore: { kind: 'conflict-clause', verb: 'INSERT', clause: 'ON CONFLICT DO NOTHING' },
  };

  placeholder(ordinal: number): string {
    return `$${ordinal}`;
  }

  protected override escapeDate(value: Date): string {
    return `'${value.toISOString()}'::timestamptz`;
  }

  protected override escapeBinary(value: Buffer): string {
    return `'\\x${value.toString('hex')}'::bytea`;
  }

  protected override escapeArray(values: unknown[]): string {
    return `ARRAY[${values.map((v) => this.escapeValue(v)).join(', ')}]`;
  }

  protected override escapeObject(value: unknown): string {
    return `${this.escapeString(this.toJson(value))}::jsonb`;
  }
}
