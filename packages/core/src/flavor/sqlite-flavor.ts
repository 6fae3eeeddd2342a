/**
 * SQLite Flavor
 *
 * - Double quote (") identifier quoting
 * - Positional (?) parameter placeholders
 * - INSERT OR IGNORE
 */

import { SQLFlavor } from './sql-flavor';

import type { FlavorConfig } from './sql-flavor';

export class SQLiteFlavor extends SQLFlavor {
  readonly name = 'sqlite';

  readonly config: FlavorConfig = {
    identifierQuote: { open: '"', close: '"' },
    numberedPlaceholders: false,
    booleanLiterals: { true: '1', false: '0' },
    insertIgnore: { kind: 'verb', verb: 'INSERT OR IGNORE' },
  };

  placeholder(): string {
    return '?';
  }
}
