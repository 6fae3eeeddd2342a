/**
 * Query Builder Module
 *
 * - Args: deferred argument binding and compilation
 * - Injection: raw fragments keyed by render checkpoint
 * - InsertBuilder: INSERT / INSERT IGNORE / REPLACE
 *
 * @module query
 */

export { Args } from './args';
export { isBuilder, type Builder, type BuiltSQL } from './builder';
export { Injection } from './injection';
export {
  InsertBuilder,
  InsertMarker,
  newInsertBuilder,
  insertInto,
  insertIgnoreInto,
  replaceInto,
} from './insert-builder';
export { raw, list, isRaw, isList, type RawExpression, type ListArgument } from './markers';
export { createQueryFactory, type QueryFactory, type QueryFactoryOptions } from './query-factory';
