/**
 * ClickHouse Flavor
 *
 * Deduplication is left to the table engine, so there is no INSERT IGNORE.
 */

import { SQLFlavor } from './sql-flavor';

import type { FlavorConfig } from './sql-flavor';

export class ClickHouseFlavor extends SQLFlavor {
  readonly name = 'clickhouse';

  readonly config: FlavorConfig = {
    identifierQuote: { open: '`', close: '`' },
    numberedPlaceholders: false,
    booleanLiterals: { true: 'true', false: 'false' },
    insertIgnore: { kind: 'unsupported', verb: 'INSERT' },
  };

  placeholder(): string {
    return '?';
  }

  protected override escapeString(value: string): string {
    return `'${value.replaceAll('\\', '\\\\').replaceAll("'", "\\'")}'`;
  }

  protected override escapeBinary(value: Buffer): string {
    return `unhex('${value.toString('hex')}')`;
  }

  protected override escapeArray(values: unknown[]): string {
    return `[${values.map((v) => this.escapeValue(v)).join(', ')}]`;
  }
}
