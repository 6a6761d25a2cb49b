import { StateComparator } from './comparator';
import { defaultMessages } from './messages';
import type { ComparisonOptions } from './options';
import type { ComparisonReport, MessageCatalog, TraceEntry } from './types';

export { StateComparator, type StateComparatorOptions } from './comparator';
export { defaultMessages } from './messages';
export {
  type ComparisonOptions,
  comparisonOptionsSchema,
  resolveComparisonOptions
} from './options';
export type * from './types';

/**
 * Reports whether `current` is in the state described by `desired`.
 *
 * @example
 *   statesEqual({ Tags: ['b', 'a'] }, { Tags: ['a', 'b'] });
 *   // false
 *   statesEqual({ Tags: ['b', 'a'] }, { Tags: ['a', 'b'] }, { sortArraysBeforeCompare: true });
 *   // true
 */
export function statesEqual(
  current: unknown,
  desired: unknown,
  options: Partial<ComparisonOptions> = {}
): boolean {
  return new StateComparator().compare(current, desired, options);
}

/**
 * Same comparison as {@link statesEqual}, returning every trace entry next to
 * the verdict.
 */
export function compareStates(
  current: unknown,
  desired: unknown,
  options: Partial<ComparisonOptions> = {},
  messages: MessageCatalog = defaultMessages
): ComparisonReport {
  const entries: TraceEntry[] = [];
  const comparator = new StateComparator({
    messages,
    sink: entry => {
      entries.push(entry);
    }
  });

  const inDesiredState = comparator.compare(current, desired, options);
  return { inDesiredState, entries };
}
