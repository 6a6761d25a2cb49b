import { z } from 'zod';

import { validateWithSchema } from '../validator';

/**
 * Comparison options schema.
 *
 * - `restrictToProperties`: compare only these keys instead of every key of
 *   the desired state.
 * - `excludeProperties`: keys left out of the comparison.
 * - `skipTypeChecking`: compare values of different runtime types by their
 *   text (`5` equals `'5'`).
 * - `sortArraysBeforeCompare`: ignore element order.
 * - `alsoCheckReverse`: run a second pass with current and desired swapped.
 */
export const comparisonOptionsSchema = z
  .object({
    restrictToProperties: z.array(z.string()).optional(),
    excludeProperties: z.array(z.string()).optional(),
    skipTypeChecking: z.boolean(),
    sortArraysBeforeCompare: z.boolean(),
    alsoCheckReverse: z.boolean()
  })
  .strict();

export type ComparisonOptions = z.infer<typeof comparisonOptionsSchema>;

/**
 * Merges the provided partial options with the comparator defaults.
 *
 * Every flag defaults to `false`; both property lists default to absent.
 */
export function normalizeComparisonOptions(
  options: Partial<ComparisonOptions>
): ComparisonOptions {
  return {
    skipTypeChecking: false,
    sortArraysBeforeCompare: false,
    alsoCheckReverse: false,
    ...options
  };
}

/**
 * @throws {InvalidOptionsError} When a property list holds anything but
 *   strings, a flag is not a boolean, or an unknown option is given.
 */
export function resolveComparisonOptions(
  options: Partial<ComparisonOptions> = {}
): ComparisonOptions {
  return validateWithSchema(
    comparisonOptionsSchema,
    normalizeComparisonOptions(options),
    'comparison options'
  );
}
