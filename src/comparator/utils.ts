import { typeName } from '../classifier';
import { isArray, isPlainObject, isRecord } from '../guards';
import { serialize } from '../serializer';
import {
  isCallable,
  isNullish,
  isNumber,
  isString
} from '../utils/type-guards';
import { Credential, Enumeration, SecureValue } from '../values';

/**
 * Internal tags of the built-ins compared by value rather than by reference.
 *
 * Read through `Object.prototype.toString` instead of `constructor.name`:
 * minifiers rename constructors, and `constructor` can be reassigned.
 */
const Tag = {
  String: '[object String]',
  Number: '[object Number]',
  Boolean: '[object Boolean]',
  BigInt: '[object BigInt]',
  Date: '[object Date]',
  RegExp: '[object RegExp]'
} as const;

const RICH_TYPES = new Set<string>([
  // Boxed Primitives
  Tag.String,
  Tag.Number,
  Tag.Boolean,
  Tag.BigInt,
  // Complex Types
  Tag.Date,
  Tag.RegExp
]);

/**
 * Determines if a value is a "rich" built-in (`Date`, `RegExp` or a boxed
 * primitive).
 */
export function isRichType(value: object): boolean {
  return RICH_TYPES.has(Object.prototype.toString.call(value));
}

/**
 * Extracts the primitive behind a wrapper object through its `valueOf`.
 */
function unbox(wrapper: object): unknown {
  const valueOf: unknown = Reflect.get(wrapper, 'valueOf');
  return isCallable(valueOf) ? Reflect.apply(valueOf, wrapper, []) : wrapper;
}

/**
 * Compares two rich values by content.
 *
 * - Boxed primitives by their primitive (`NaN` equals `NaN`).
 * - `Date` by timestamp.
 * - `RegExp` by source and flags.
 */
export function areRichValuesEqual(left: object, right: object): boolean {
  const leftTypeTag = Object.prototype.toString.call(left);
  const rightTypeTag = Object.prototype.toString.call(right);

  if (leftTypeTag !== rightTypeTag) return false;

  switch (leftTypeTag) {
    case Tag.Number:
    case Tag.Date:
      return Object.is(unbox(left), unbox(right));

    case Tag.String:
    case Tag.Boolean:
    case Tag.BigInt:
      return unbox(left) === unbox(right);

    case Tag.RegExp:
      return left.toString() === right.toString();

    default:
      return false;
  }
}

/**
 * Fast equality.
 *
 * 1. Identity, with `NaN` equal to itself and `0` equal to `-0`.
 * 2. Rich built-ins by content.
 * 3. Secure values by their plain text, enumeration members by type and
 *    value.
 */
export function areValuesEqual(left: unknown, right: unknown): boolean {
  if (left === right || Object.is(left, right)) return true;
  if (!isRecord(left) || !isRecord(right)) return false;

  if (left instanceof SecureValue && right instanceof SecureValue) {
    return left.reveal() === right.reveal();
  }
  if (left instanceof Enumeration && right instanceof Enumeration) {
    return left.typeName === right.typeName && left.value === right.value;
  }

  return isRichType(left) && areRichValuesEqual(left, right);
}

/**
 * Replaces secret material with a fixed mask so a value can be shown in a
 * trace line.
 */
function maskSecrets(value: unknown): unknown {
  if (value instanceof SecureValue) return new SecureValue('***');
  if (value instanceof Credential) return new Credential(value.userName, '***');
  if (isArray(value)) return value.map(maskSecrets);
  if (value instanceof Map) {
    return new Map([...value].map(([key, entry]): [unknown, unknown] => [key, maskSecrets(entry)]));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]): [string, unknown] => [key, maskSecrets(entry)])
    );
  }
  return value;
}

/**
 * Renders a value for a trace line: compact, weakly typed literal text.
 */
export function formatValue(value: unknown): string {
  return serialize(maskSecrets(value), { expand: -1 });
}

/**
 * Text form used when values of different types are compared with type
 * checking off.
 */
export function scalarText(value: unknown): string {
  return isRecord(value) ? formatValue(value) : String(value);
}

/**
 * Scalar fallback equality: fast equality, then, when `compareText` is set
 * and the runtime types differ, equal text. `null` and `undefined` only equal
 * each other.
 */
export function areScalarsEqual(
  left: unknown,
  right: unknown,
  compareText: boolean
): boolean {
  if (isNullish(left) || isNullish(right)) {
    return isNullish(left) && isNullish(right);
  }
  if (areValuesEqual(left, right)) return true;
  return (
    compareText &&
    typeName(left) !== typeName(right) &&
    scalarText(left) === scalarText(right)
  );
}

/**
 * Sort order for `sortArraysBeforeCompare`: numbers first in numeric order,
 * then every other value by its text.
 */
export function compareForSort(left: unknown, right: unknown): number {
  if (isNumber(left) && isNumber(right)) {
    if (left === right || (Number.isNaN(left) && Number.isNaN(right))) return 0;
    if (Number.isNaN(left)) return 1;
    if (Number.isNaN(right)) return -1;
    return left < right ? -1 : 1;
  }
  if (isNumber(left)) return -1;
  if (isNumber(right)) return 1;

  const leftText = isString(left) ? left : scalarText(left);
  const rightText = isString(right) ? right : scalarText(right);
  if (leftText === rightText) return 0;
  return leftText < rightText ? -1 : 1;
}

export function sortedCopy(items: readonly unknown[]): unknown[] {
  return [...items].sort(compareForSort);
}
