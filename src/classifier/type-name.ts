import { isRecord } from '../guards';
import { isCallable } from '../utils/type-guards';

/**
 * Reads the constructor name of an object through its prototype.
 *
 * Null-prototype objects and objects whose constructor is missing or anonymous
 * report `Object`, the name of the literal's natural map type.
 */
export function constructorName(value: object): string {
  const proto: unknown = Object.getPrototypeOf(value);
  if (!isRecord(proto)) return 'Object';

  const ctor = proto.constructor;
  return isCallable(ctor) && ctor.name ? ctor.name : 'Object';
}

/**
 * Runtime type name of any value.
 *
 * - primitives: their `typeof` (`'string'`, `'number'`, `'bigint'`, ...)
 * - `null`: `'null'`
 * - functions: `'Function'`
 * - objects: the constructor name (`'Date'`, `'Map'`, `'Service'`, ...)
 */
export function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'function') return 'Function';
  if (typeof value !== 'object') return typeof value;
  return constructorName(value);
}
