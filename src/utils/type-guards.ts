export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
};

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/** Guard verifying the value is a symbol. */
export const isSymbol = is('symbol');

/**
 * Guard verifying the value is `null` or `undefined`.
 *
 * Both are rendered as the null literal and both count as "no known runtime
 * type" for the comparator's type check.
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Guard verifying the value is a callable (a function or a class constructor).
 *
 * The predicate type is the widest callable signature that can still be
 * invoked with zero arguments without casts.
 */
export function isCallable(
  value: unknown
): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

/**
 * Guard verifying a callable is an ES class constructor.
 *
 * Class constructors are the "type references" of the literal language: they
 * serialize as a tagged type name rather than as a code block. The check uses
 * the source text, which always starts with `class` for class syntax.
 */
export function isClassConstructor(
  value: unknown
): value is abstract new (...args: never[]) => unknown {
  return (
    isCallable(value) &&
    /^class[\s{]/.test(Function.prototype.toString.call(value))
  );
}
