/**
 * SQL Server Flavor
 *
 * - Bracket ([name]) identifier quoting
 * - Numbered (@p1, @p2) parameter placeholders
 * - Unicode (N'...') string literals
 */

import { SQLFlavor } from './sql-flavor';

import type { FlavorConfig } from './sql-flavor';

export class SQLServerFlavor extends SQLFlavor {
  readonly name = 'sqlserver';

  readonly config: FlavorConfig = {
    identifierQuote: { open: '[', close: ']' },
    numberedPlaceholders: true,
    booleanLiterals: { true: '1', false: '0' },
    insertIgnore: { kind: 'unsupported', verb: 'INSERT' },
  };

  placeholder(ordinal: number): string {
    return `@p${ordinal}`;
  }

  protected override escapeString(value: string): string {
    return `N${super.escapeString(value)}`;
  }

  protected override escapeBinary(value: Buffer): string {
    return `0x${value.toString('hex')}`;
  }
}
