/**
 * Ordered map from property name to value; the shape both sides of a
 * comparison are brought into before any key is compared.
 */
export type PropertyBag = Record<string, unknown>;

/**
 * - `match` / `no-match`: the verdict for one compared key or element.
 * - `info`: context that carries no verdict (a skipped key, the start of the
 *   reverse pass).
 */
export type TraceOutcome = 'match' | 'no-match' | 'info';

export type TraceEntry = {
  outcome: TraceOutcome;
  /** Keys (and element indices) from the compared bag down to the value. */
  path: string[];
  message: string;
  current?: unknown;
  desired?: unknown;
};

export type TraceSink = (entry: TraceEntry) => void;

/**
 * Text of every trace line the comparator writes. Values arrive already
 * rendered as literal text, with secrets masked.
 */
export type MessageCatalog = {
  typeMismatch(property: string, currentType: string, desiredType: string): string;
  valueMatch(property: string, current: string, desired: string): string;
  valueNoMatch(property: string, current: string, desired: string): string;
  credentialMatch(property: string, userName: string): string;
  credentialNoMatch(property: string, currentUserName: string | undefined, desiredUserName: string): string;
  arrayLengthMismatch(property: string, currentLength: number, desiredLength: number): string;
  arrayElementMismatch(property: string, index: number, current: string, desired: string): string;
  keyAbsent(property: string): string;
  reversePass(): string;
};

export type ComparisonReport = {
  inDesiredState: boolean;
  entries: TraceEntry[];
};
