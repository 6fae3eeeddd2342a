/**
 * CQL (Cassandra) Flavor
 *
 * An INSERT overwrites an existing row; `IF NOT EXISTS` turns it into a
 * lightweight transaction that leaves the existing row alone.
 */

import { SQLFlavor } from './sql-flavor';

import type { FlavorConfig } from './sql-flavor';

export class CQLFlavor extends SQLFlavor {
  readonly name = 'cql';

  readonly config: FlavorConfig = {
    identifierQuote: { open: '"', close: '"' },
    numberedPlaceholders: false,
    booleanLiterals: { true: 'true', false: 'false' },
    insertIgnore: { kind: 'conflict-clause', verb: 'INSERT', clause: 'IF NOT EXISTS' },
  };

  placeholder(): string {
    return '?';
  }

  // Timestamps as milliseconds since the epoch
  protected override escapeDate(value: Date): string {
    return String(value.getTime());
  }

  protected override escapeBinary(value: Buffer): string {
    return `0x${value.toString('hex')}`;
  }

  protected override escapeArray(values: unknown[]): string {
    return `[${values.map((v) => this.escapeValue(v)).join(', ')}]`;
  }
}
