/**
 * MySQL Flavor
 *
 * - Backtick (`) identifier quoting
 * - Positional (?) parameter placeholders
 * - INSERT IGNORE
 */

import { SQLFlavor } from './sql-flavor';

import type { FlavorConfig } from './sql-flavor';

export class MySQLFlavor extends SQLFlavor {
  readonly name = 'mysql';

  readonly config: FlavorConfig = {
    identifierQuote: { open: '`', close: '`' },
    numberedPlaceholders: false,
    booleanLiterals: { true: 'TRUE', false: 'FALSE' },
    insertIgnore: { kind: 'verb', verb: 'INSERT IGNORE' },
  };

  placeholder(): string {
    return '?';
  }

  protected override escapeString(value: string): string {
    // Escape single quotes and backslashes
    return `'${value.replaceAll('\\', '\\\\').replaceAll("'", "\\'")}'`;
  }
}
