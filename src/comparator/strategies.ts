import { isArray } from '../guards';
import { isNullish } from '../utils/type-guards';
import type { ComparisonOptions } from './options';
import { sortedCopy } from './utils';

/**
 * What to do with a key whose desired value is an array.
 */
export type ArrayPlan =
  | {
      /** Both sides are empty or absent. */
      mode: 'match';
    }
  | {
      /** The current side is absent but elements are desired. */
      mode: 'absent';
    }
  | {
      mode: 'length';
      currentLength: number;
      desiredLength: number;
    }
  | {
      /** Same length: compare element by element. */
      mode: 'elements';
      current: unknown[];
      desired: unknown[];
    };

/**
 * Decides how an array-valued key is compared.
 *
 * A scalar `current` counts as a one-element array. With
 * `sortArraysBeforeCompare` both sides are sorted independently; the inputs
 * themselves are never reordered.
 */
export function planArrayComparison(
  currentValue: unknown,
  desired: readonly unknown[],
  options: ComparisonOptions
): ArrayPlan {
  const currentEmpty =
    isNullish(currentValue) || (isArray(currentValue) && currentValue.length === 0);

  if (desired.length === 0 && currentEmpty) return { mode: 'match' };
  if (isNullish(currentValue)) return { mode: 'absent' };

  const current = isArray(currentValue) ? currentValue : [currentValue];
  if (current.length !== desired.length) {
    return { mode: 'length', currentLength: current.length, desiredLength: desired.length };
  }

  return options.sortArraysBeforeCompare
    ? { mode: 'elements', current: sortedCopy(current), desired: sortedCopy(desired) }
    : { mode: 'elements', current: [...current], desired: [...desired] };
}
