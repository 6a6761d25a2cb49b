/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either:
 *    - `Object.prototype` (typical object literals / `new Object()`), or
 *    - `null` (objects created via `Object.create(null)`).
 *
 * As a result, this returns `false` for common non-plain objects such as:
 * - Arrays
 * - Dates
 * - Maps and Sets
 * - Class instances
 * - Errors, RegExps, and other host/boxed objects
 *
 * Plain objects are the natural default of the map literal `@{ ... }`: they
 * serialize without a type tag in weak mode and are what the extractor builds.
 *
 * @typeParam T
 *   The (assumed) type of the object's property values after a successful check.
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<PropertyKey, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Checks whether a value is an instance of a user-defined class: an object
 * that is neither plain, nor an array, nor one of the built-ins the engine
 * knows by name.
 *
 * @param value  Value to test.
 * @returns      `true` for class instances such as `new Service()`.
 */
export function isClassInstance(value: unknown): value is object {
  if (!isRecord(value) || isArray(value) || isPlainObject(value)) return false;
  return !(
    value instanceof Map ||
    value instanceof Set ||
    value instanceof Date ||
    value instanceof RegExp ||
    ArrayBuffer.isView(value)
  );
}

/**
 * Checks whether a value can act as a property bag: a plain object, a `Map`
 * or a class instance.
 *
 * @param value  Value to test.
 * @returns      `true` if the comparator can treat `value` as a property bag.
 */
export function isPropertyBagLike(value: unknown): value is object {
  return isPlainObject(value) || value instanceof Map || isClassInstance(value);
}

/**
 * Checks whether a value is a typed array (`Uint8Array`, `Float64Array`, ...,
 * including `Buffer`).
 *
 * Typed arrays are the "primitive arrays" of the serializer: their elements
 * are always numbers, so they never expand one element per line.
 *
 * `DataView` is also an `ArrayBuffer` view but has no elements and is excluded.
 */
export function isTypedArray(
  value: unknown
): value is ArrayLike<number | bigint> & Iterable<number | bigint> {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/**
 * Checks whether a value is iterable.
 *
 * Strings are iterable too; callers classify strings before reaching here.
 */
export function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}
