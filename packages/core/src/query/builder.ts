import type { SQLFlavor } from '../flavor/sql-flavor';

/**
 * Compiled statement, ready for a driver's parameterized query call
 */
export interface BuiltSQL {
  sql: string;
  args: unknown[];
}

/**
 * Contract shared by every statement builder.
 *
 * A builder passed as an argument to another builder is compiled in place:
 * its SQL is inlined and its arguments are merged at the right position.
 */
export interface Builder {
  build(): BuiltSQL;
  buildWithFlavor(flavor: SQLFlavor, ...initialArgs: unknown[]): BuiltSQL;
  /**
   * Render the statement with every argument written as an SQL literal.
   * Only for logging and debugging; never execute the result.
   */
  interpolate(flavor?: SQLFlavor): string;
}

export function isBuilder(value: unknown): value is Builder {
  return (
    typeof value === 'object' &&
    value !== null &&
    'buildWithFlavor' in value &&
    typeof value.buildWithFlavor === 'function' &&
    'interpolate' in value &&
    typeof value.interpolate === 'function'
  );
}
