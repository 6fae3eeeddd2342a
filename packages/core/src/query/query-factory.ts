/**
 * Query Factory
 *
 * Binds statement builders to one flavor, so that code targeting a given
 * database never depends on the process-wide default.
 *
 * @example
 * ```typescript
 * const qb = createQueryFactory({ flavor: 'postgresql' });
 *
 * const { sql, args } = qb
 *   .insertIgnoreInto('users')
 *   .cols('email')
 *   .values('ada@example.com')
 *   .build();
 * // sql:  'INSERT INTO users (email) VALUES ($1) ON CONFLICT DO NOTHING'
 * // args: ['ada@example.com']
 * ```
 */

import { getDefaultFlavor } from '../config';
import { FlavorFactory } from '../flavor/flavor-factory';
import { InsertBuilder } from './insert-builder';

import type { SQLFlavor } from '../flavor/sql-flavor';

export interface QueryFactoryOptions {
  /** Flavor instance, name or alias; defaults to the configured default flavor */
  flavor?: SQLFlavor | string;
}

export interface QueryFactory {
  /**
   * Create a new, empty INSERT builder
   */
  insert(): InsertBuilder;

  insertInto(table: string): InsertBuilder;

  insertIgnoreInto(table: string): InsertBuilder;

  replaceInto(table: string): InsertBuilder;

  getFlavor(): SQLFlavor;
}

export function createQueryFactory(options: QueryFactoryOptions = {}): QueryFactory {
  const flavor =
    options.flavor === undefined
      ? getDefaultFlavor()
      : typeof options.flavor === 'string'
        ? FlavorFactory.getFlavor(options.flavor)
        : options.flavor;

  return {
    insert(): InsertBuilder {
      return new InsertBuilder(flavor);
    },

    insertInto(table: string): InsertBuilder {
      return new InsertBuilder(flavor).insertInto(table);
    },

    insertIgnoreInto(table: string): InsertBuilder {
      return new InsertBuilder(flavor).insertIgnoreInto(table);
    },

    replaceInto(table: string): InsertBuilder {
      return new InsertBuilder(flavor).replaceInto(table);
    },

    getFlavor(): SQLFlavor {
      return flavor;
    },
  };
}
