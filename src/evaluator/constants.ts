/**
 * Represents a successful static resolution.
 *
 * Meaning:
 * - The input node was statically resolvable under the current resolver allowlist.
 * - The returned `value` is what the node **evaluates to** under JavaScript
 *   evaluation rules, computed without running any code.
 *
 * Usage:
 * - Consumers should branch on `result.success`.
 * - When `success: true`, `value` is available and should be treated as the
 *   node's evaluated constant.
 */
export type StaticSuccess<T> = {
  /**
   * Discriminant flag indicating the resolution succeeded.
   */
  success: true;

  /**
   * The value the node evaluates to (static evaluation result).
   *
   * Note:
   * This may legitimately be `undefined`; this is distinct from failure
   * (`success: false`).
   */
  value: T;
};

/**
 * Represents a failed static resolution.
 *
 * Meaning:
 * - The input could not be resolved to a static value under the current
 *   resolver allowlist (identifiers, calls, unsupported operators, or source
 *   text that does not parse).
 *
 * Contract:
 * - Failure carries no value payload.
 * - Callers treat this as "dynamic" and apply their own fallback (the
 *   comparator falls back to the code block's source text).
 */
export type StaticFailure = {
  /**
   * Discriminant flag indicating the resolution failed.
   */
  success: false;
};

/**
 * Discriminated union representing the outcome of a static resolution attempt.
 *
 * Pattern:
 * - `success: true`  => an evaluated value is available (`StaticSuccess<T>`)
 * - `success: false` => resolution failed (`StaticFailure`)
 *
 * This distinguishes "evaluates to undefined" from "could not resolve".
 */
export type StaticResult<T = unknown> = StaticSuccess<T> | StaticFailure;

/**
 * Canonical failure sentinel for "unresolvable".
 *
 * Typed as `StaticFailure` to preserve the discriminant precisely.
 */
export const UNRESOLVED: StaticFailure = { success: false } as const;

/**
 * Constructs a successful static resolution result.
 *
 * @param value
 *   The evaluated value to wrap (result of static evaluation).
 * @returns
 *   A {@link StaticSuccess} wrapper containing `value`.
 */
export function resolved<T>(value: T): StaticSuccess<T> {
  return { success: true, value };
}

/**
 * Internal control sentinel for container evaluation.
 *
 * Semantics:
 * Represents a "non-static" signal within the recursion engine: the subtree
 * cannot be decoded into a value without running code.
 *
 * Every container rejects as a whole when one of its parts returns this
 * signal; the public adapters convert it to {@link UNRESOLVED}.
 *
 * Uses `Symbol.for` so the signal keeps its identity even when the module is
 * loaded twice.
 *
 * Contract:
 * - Internal: Used strictly for recursion control.
 * - Public: Must NEVER leak into an evaluated value.
 */
export const SKIP_VALUE = Symbol.for('literal-reconcile.evaluation.skip');
