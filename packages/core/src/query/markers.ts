/**
 * Argument markers
 *
 * Values passed to `Args.add` are normally bound as parameters. The markers
 * below change that: a raw expression is written into the statement as is,
 * a list expands into one placeholder per element.
 *
 * Markers are branded with a registered symbol so that plain objects coming
 * from user input can never be mistaken for raw SQL.
 */

const SQL_RAW = Symbol.for('sqlweave:raw');
const SQL_LIST = Symbol.for('sqlweave:list');

export interface RawExpression {
  readonly [SQL_RAW]: true;
  readonly expr: string;
}

export interface ListArgument {
  readonly [SQL_LIST]: true;
  readonly values: readonly unknown[];
}

/**
 * Mark an expression to be written verbatim, e.g. `raw('NOW()')`
 */
export function raw(expr: string): RawExpression {
  return { [SQL_RAW]: true, expr };
}

/**
 * Expand values into a comma-separated placeholder list, e.g. for `IN (...)`
 */
export function list(values: readonly unknown[]): ListArgument {
  return { [SQL_LIST]: true, values };
}

export function isRaw(value: unknown): value is RawExpression {
  return typeof value === 'object' && value !== null && SQL_RAW in value;
}

export function isList(value: unknown): value is ListArgument {
  return typeof value === 'object' && value !== null && SQL_LIST in value;
}
