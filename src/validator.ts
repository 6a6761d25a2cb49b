import type { StandardSchemaV1 } from '@standard-schema/spec';
import { InvalidOptionsError, type OptionsIssue } from './errors';

/**
 * Formats a Standard Schema issue path as a dotted label (e.g. `"indentChar"`,
 * `"restrictToProperties.2"`).
 *
 * Path segments may be raw property keys or `{ key }` wrappers, depending on
 * the validator library.
 */
function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string {
  if (!path) return '';
  return path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}

/**
 * Validates and coerces options using a Standard Schema V1 compliant validator.
 *
 * The `~standard` adapter is the only surface touched, so the option schemas
 * can be written with any compliant library (Zod here) without this module
 * depending on it.
 *
 * Schema Object Layout:
 * ```ts
 * const schema = {
 *   // Result pattern: returns { value } or { issues }, never throws.
 *   "~standard": {
 *     validate: (input) => Result
 *   },
 *   ...libraryInternals
 * };
 * ```
 *
 * Option parsing happens inside synchronous serialize/compare calls, so a
 * validator that answers with a Promise is rejected.
 *
 * @param schema - The schema instance (must contain `~standard`).
 * @param input - Raw options as supplied by the caller.
 * @param label - Name used in error messages (e.g. `"serialize options"`).
 * @returns The validated (and possibly defaulted) options.
 * @throws {InvalidOptionsError} When the schema reports any issue. Every issue
 *   is listed, not only the first.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  label: string
): StandardSchemaV1.InferOutput<S> {
  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new TypeError(
      `Async schema validation is not supported for ${label}.`
    );
  }

  if (result.issues) {
    const issues: OptionsIssue[] = result.issues.map(issue => ({
      path: formatIssuePath(issue.path),
      message: issue.message
    }));
    throw new InvalidOptionsError(label, issues);
  }

  return result.value;
}
