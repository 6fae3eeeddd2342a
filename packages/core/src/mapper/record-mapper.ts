/**
 * Record Mapper
 *
 * Projects a typed record onto the ordered (column, value) pairs of an
 * INSERT. Fields are declared up front with a tag of the form
 * `column[;primary_key]`; primary-key fields are reported but left out of
 * generated inserts.
 *
 * @example
 * ```typescript
 * interface User { id: number; name: string; email: string }
 *
 * const userMapper = defineRecordMapper<User>([
 *   { field: 'id', tag: 'id;primary_key' },
 *   { field: 'name' },
 *   { field: 'email', tag: 'email_address' },
 * ]);
 *
 * insertInto('users').insertItem(user, userMapper);
 * // INSERT INTO users (name, email_address) VALUES (?, ?)
 * ```
 */

import { ValidationError } from '../errors';

export interface FieldEntry {
  column: string;
  value: unknown;
  isPrimaryKey: boolean;
}

/**
 * Any function producing ordered field entries can act as a mapper
 */
export type RecordMapper<T> = (record: T) => FieldEntry[];

export interface FieldTag {
  column: string;
  isPrimaryKey: boolean;
}

export interface FieldDescriptor<T> {
  field: keyof T & string;
  /** Defaults to the field name */
  tag?: string;
}

const PRIMARY_KEY_OPTION = 'primary_key';

export function parseFieldTag(tag: string, field?: string): FieldTag {
  const [column = '', ...options] = tag.split(';').map((part) => part.trim());

  if (column.length === 0) {
    throw new ValidationError(`Field tag "${tag}" has no column name`, field);
  }

  let isPrimaryKey = false;
  for (const option of options) {
    if (option !== PRIMARY_KEY_OPTION) {
      throw new ValidationError(`Unknown field tag option "${option}" in "${tag}"`, field);
    }
    isPrimaryKey = true;
  }

  return { column, isPrimaryKey };
}

export function defineRecordMapper<T>(fields: readonly FieldDescriptor<T>[]): RecordMapper<T> {
  const columns = new Set<string>();
  const parsed = fields.map(({ field, tag }) => {
    const parsedTag = parseFieldTag(tag ?? field, field);
    if (columns.has(parsedTag.column)) {
      throw new ValidationError(`Column "${parsedTag.column}" is mapped more than once`, field);
    }
    columns.add(parsedTag.column);
    return { field, ...parsedTag };
  });

  return (record) =>
    parsed.map(({ field, column, isPrimaryKey }) => ({
      column,
      value: record[field],
      isPrimaryKey,
    }));
}
