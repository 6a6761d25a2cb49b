import { isDocument } from 'yaml';

import { hasComment } from '../evaluator';
import {
  isArray,
  isIterable,
  isPlainObject,
  isRecord,
  isTypedArray
} from '../guards';
import {
  isBigInt,
  isBoolean,
  isCallable,
  isClassConstructor,
  isNullish,
  isNumber,
  isString,
  isSymbol
} from '../utils/type-guards';
import { CodeBlock, Credential, Enumeration, SecureValue } from '../values';
import type { Category, MapCategory, MapKey, SequenceCategory } from './types';
import { constructorName, typeName } from './type-name';

export type * from './types';
export { constructorName, typeName } from './type-name';

/**
 * Marker for custom types that write themselves as quoted, tagged text
 * (version numbers, mail addresses and the like).
 *
 * An object with a method under this key is classified as a tagged string; the
 * method returns the text.
 *
 * @example
 *   class Version {
 *     constructor(readonly major: number, readonly minor: number) {}
 *     [QUOTED_TAG]() { return `${this.major}.${this.minor}`; }
 *   }
 */
export const QUOTED_TAG: unique symbol = Symbol.for('literal-reconcile.quoted');

/**
 * Internal type tags for boxed primitives, read via `Object.prototype.toString`
 * so a renamed or spoofed `constructor` cannot hide them.
 */
const BOXED_TAGS = new Set<string>([
  '[object String]',
  '[object Number]',
  '[object Boolean]',
  '[object BigInt]',
  '[object Symbol]'
]);

/**
 * Calls a method found under `key`, if there is one.
 *
 * @returns
 *   `{ found: false }` when `value` has no callable under `key`; otherwise the
 *   return value.
 */
function callMember(
  value: object,
  key: PropertyKey,
  args: unknown[] = []
): { found: false } | { found: true; result: unknown } {
  const member: unknown = Reflect.get(value, key);
  if (!isCallable(member)) return { found: false };
  return { found: true, result: Reflect.apply(member, value, args) };
}

function readQuotedText(value: object): string | undefined {
  const call = callMember(value, QUOTED_TAG);
  return call.found && isString(call.result) ? call.result : undefined;
}

/**
 * Reads the numeric identity of an opaque handle (Node timers and similar
 * objects that convert to a number through `Symbol.toPrimitive`).
 */
function readHandle(value: object): number | undefined {
  let call: ReturnType<typeof callMember>;
  try {
    call = callMember(value, Symbol.toPrimitive, ['number']);
  } catch {
    // A conversion that throws means the object is not a handle.
    return undefined;
  }
  return call.found && isNumber(call.result) ? call.result : undefined;
}

function isTabular(
  value: object
): value is { columns: unknown[]; rows: unknown[] } {
  return (
    isRecord(value) &&
    !isPlainObject(value) &&
    isArray(value.columns) &&
    isArray(value.rows)
  );
}

function toMapKey(key: unknown): MapKey {
  return isString(key) || isNumber(key) ? key : String(key);
}

/**
 * Collects the readable properties of a class instance.
 *
 * Own enumerable properties win. An instance without any exposes its state
 * through accessors declared on its prototype chain, so those are read
 * instead, nearest prototype first.
 */
function readInstanceEntries(value: object): Array<[MapKey, unknown]> {
  const own = Object.keys(value);
  if (own.length > 0) {
    return own.map((key): [MapKey, unknown] => [key, Reflect.get(value, key)]);
  }

  const names: string[] = [];
  let proto: unknown = Object.getPrototypeOf(value);
  while (isRecord(proto) && proto !== Object.prototype) {
    for (const [name, descriptor] of Object.entries(
      Object.getOwnPropertyDescriptors(proto)
    )) {
      if (descriptor.get && !names.includes(name)) names.push(name);
    }
    proto = Object.getPrototypeOf(proto);
  }

  return names.map((name): [MapKey, unknown] => [name, Reflect.get(value, name)]);
}

/**
 * Reads the entries of a keyed collection that is not a `Map` but exposes
 * `keys()` and `get(key)`.
 */
function readKeyedEntries(value: object): Array<[MapKey, unknown]> | null {
  const keys = callMember(value, 'keys');
  if (!keys.found || !isIterable(keys.result)) return null;
  if (!isCallable(Reflect.get(value, 'get'))) return null;

  const entries: Array<[MapKey, unknown]> = [];
  for (const key of keys.result) {
    const lookup = callMember(value, 'get', [key]);
    entries.push([toMapKey(key), lookup.found ? lookup.result : undefined]);
  }
  return entries;
}

function mapCategory(
  value: object,
  entries: Array<[MapKey, unknown]>,
  tag?: string
): MapCategory {
  const name = constructorName(value);
  return {
    kind: 'map',
    typeName: name,
    tag: tag ?? name,
    tagRequired: tag !== undefined || name !== 'Object',
    entries
  };
}

function sequenceCategory(
  value: object,
  items: unknown[],
  primitive = false
): SequenceCategory {
  const name = isArray(value) ? 'Array' : constructorName(value);
  return {
    kind: 'sequence',
    typeName: name,
    tag: name,
    tagRequired: name !== 'Array',
    items,
    primitive
  };
}

/**
 * Rule 16: structured objects that matched nothing more specific.
 *
 * Reading properties runs getters; an object whose getters throw cannot be
 * described and becomes an empty map.
 */
function classifyStructured(value: object): Category {
  if (isArray(value)) return sequenceCategory(value, [...value]);
  if (isTypedArray(value)) return sequenceCategory(value, Array.from(value), true);

  try {
    if (isPlainObject(value)) {
      return mapCategory(value, Object.entries(value));
    }

    const keyed = readKeyedEntries(value);
    if (keyed) return mapCategory(value, keyed);

    if (isIterable(value)) return sequenceCategory(value, [...value]);

    return mapCategory(value, readInstanceEntries(value));
  } catch {
    // Unreadable: degrade to a map without entries.
    return mapCategory(value, []);
  }
}

/**
 * Maps a value to the {@link Category} the serializer renders.
 *
 * The rules are tried in order and the first match wins. Several categories
 * overlap (a `Date` is also an object with `Symbol.toPrimitive`, a `Map` is
 * also iterable), so the order is part of the contract:
 *
 *  1. `null` / `undefined`
 *  2. booleans
 *  3. tagged strings: `RegExp`, `URL`, class constructors, {@link QUOTED_TAG}
 *  4. numbers and bigints (non-finite numbers become tagged scalars)
 *  5. strings
 *  6. {@link SecureValue}
 *  7. {@link Credential}
 *  8. `Date`
 *  9. {@link Enumeration}
 * 10. functions and {@link CodeBlock}
 * 11. opaque handles
 * 12. YAML documents
 * 13. tabular containers (`columns` + `rows`), classified as their rows
 * 14. `Map`
 * 15. boxed primitives and symbols
 * 16. arrays, typed arrays, plain objects, keyed collections, other
 *     iterables, class instances
 *
 * Never throws.
 *
 * @param value
 *   Any value.
 * @returns
 *   The value's category.
 */
export function classify(value: unknown): Category {
  // 1. Null
  if (isNullish(value)) {
    return { kind: 'null', typeName: typeName(value), tag: null, tagRequired: false };
  }

  // 2. Boolean
  if (isBoolean(value)) {
    return { kind: 'boolean', typeName: 'boolean', tag: 'boolean', tagRequired: false, value };
  }

  // 3. Tagged strings
  if (value instanceof RegExp || value instanceof URL) {
    const name = constructorName(value);
    const text = value instanceof URL ? value.href : value.toString();
    return { kind: 'taggedString', typeName: name, tag: name, tagRequired: false, text };
  }
  if (isClassConstructor(value)) {
    return {
      kind: 'taggedString',
      typeName: 'Function',
      tag: 'type',
      tagRequired: false,
      text: value.name
    };
  }
  if (isRecord(value)) {
    const quoted = readQuotedText(value);
    if (quoted !== undefined) {
      const name = constructorName(value);
      return { kind: 'taggedString', typeName: name, tag: name, tagRequired: false, text: quoted };
    }
  }

  // 4. Numbers
  if (isNumber(value)) {
    if (!Number.isFinite(value)) {
      return { kind: 'scalar', typeName: 'number', tag: 'number', tagRequired: true, text: String(value) };
    }
    const text = Object.is(value, -0) ? '-0' : String(value);
    return { kind: 'number', typeName: 'number', tag: 'number', tagRequired: false, text };
  }
  // Without the cast a bigint reads back as a number.
  if (isBigInt(value)) {
    return { kind: 'number', typeName: 'bigint', tag: 'bigint', tagRequired: true, text: value.toString() };
  }

  // 5. Strings
  if (isString(value)) {
    return {
      kind: 'string',
      typeName: 'string',
      tag: 'string',
      tagRequired: false,
      value,
      multiline: /[\r\n]/.test(value)
    };
  }

  // 6-7. Secrets
  if (value instanceof SecureValue) {
    return { kind: 'secure', typeName: 'SecureValue', tag: null, tagRequired: false, plainText: value.reveal() };
  }
  if (value instanceof Credential) {
    return {
      kind: 'credential',
      typeName: 'Credential',
      tag: null,
      tagRequired: false,
      userName: value.userName,
      secret: value.secret.reveal()
    };
  }

  // 8. Dates
  if (value instanceof Date) {
    const text = Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    return { kind: 'date', typeName: 'Date', tag: 'datetime', tagRequired: true, text };
  }

  // 9. Enumerations
  if (value instanceof Enumeration) {
    const numeric = value.name === undefined || value.typeName.includes('.');
    return {
      kind: 'enum',
      typeName: value.typeName,
      tag: value.typeName,
      tagRequired: !numeric,
      value: value.value,
      name: numeric ? undefined : value.name
    };
  }

  // 10. Code blocks
  if (value instanceof CodeBlock || isCallable(value)) {
    const source =
      value instanceof CodeBlock ? value.source : Function.prototype.toString.call(value);
    return {
      kind: 'codeBlock',
      typeName: value instanceof CodeBlock ? 'CodeBlock' : 'Function',
      tag: null,
      tagRequired: false,
      source,
      commented: hasComment(source)
    };
  }

  if (isSymbol(value)) {
    return { kind: 'scalar', typeName: 'symbol', tag: 'symbol', tagRequired: true, text: String(value) };
  }

  if (!isRecord(value)) {
    // Every primitive is handled above; this keeps the narrowing honest.
    return { kind: 'scalar', typeName: typeName(value), tag: typeName(value), tagRequired: true, text: String(value) };
  }

  // 11. Opaque handles
  const handle = readHandle(value);
  if (handle !== undefined) {
    return { kind: 'handle', typeName: constructorName(value), tag: null, tagRequired: false, value: handle };
  }

  // 12. Documents
  if (isDocument(value)) {
    return { kind: 'document', typeName: 'Document', tag: null, tagRequired: false, document: value };
  }

  // 13. Tabular containers
  if (isTabular(value)) {
    return classify(value.rows);
  }

  // 14. Ordered maps
  if (value instanceof Map) {
    const entries: Array<[MapKey, unknown]> = [];
    for (const [key, entry] of value) entries.push([toMapKey(key), entry]);
    return mapCategory(value, entries, 'ordered');
  }

  // 15. Boxed primitives
  const internalTag = Object.prototype.toString.call(value);
  if (BOXED_TAGS.has(internalTag)) {
    const name = constructorName(value);
    const unboxed = callMember(value, 'valueOf');
    const text = String(unboxed.found ? unboxed.result : value);
    return { kind: 'scalar', typeName: name, tag: name, tagRequired: true, text };
  }

  // 16. Fallback
  return classifyStructured(value);
}
