import { classify } from '../classifier';
import type { MapKey } from '../classifier';
import { isArray, isRecord } from '../guards';
import { isCallable, isClassConstructor, isString } from '../utils/type-guards';
import { CodeBlock } from '../values';
import type { PropertyBag } from './types';

/**
 * Entries of a value that reads as a property bag (plain object, `Map`, class
 * instance), or `null` for anything else.
 *
 * The classifier decides: what it renders as a map literal is a bag. Secrets,
 * enumeration members, documents, handles and the like keep their identity.
 */
function readBagEntries(value: unknown): Array<[MapKey, unknown]> | null {
  if (!isRecord(value) || isArray(value) || value instanceof CodeBlock) return null;
  const category = classify(value);
  return category.kind === 'map' ? category.entries : null;
}

function fromEntries(entries: Array<[MapKey, unknown]>): PropertyBag {
  return Object.fromEntries(
    entries.map(([key, entry]): [string, unknown] => [String(key), normalizeValue(entry)])
  );
}

/**
 * Copies a value with every nested `Map` and class instance turned into a
 * plain object, recursively through arrays and objects. The input is left
 * untouched.
 */
export function normalizeValue(value: unknown): unknown {
  if (isArray(value)) return value.map(normalizeValue);
  const entries = readBagEntries(value);
  return entries === null ? value : fromEntries(entries);
}

/**
 * Normalized copy of a comparator input.
 */
export function toPropertyBag(value: object): PropertyBag {
  return fromEntries(readBagEntries(value) ?? Object.entries(value));
}

/**
 * Code blocks cannot be compared structurally. A code block (or a plain
 * function) is replaced by:
 *
 * - its result, when the paired value is a string and the result can be
 *   produced (source-only blocks are evaluated statically);
 * - its source text otherwise, without surrounding whitespace.
 *
 * Any other value is returned unchanged.
 */
export function normalizeCodeBlock(value: unknown, paired: unknown): unknown {
  let block: CodeBlock;
  if (value instanceof CodeBlock) {
    block = value;
  } else if (isCallable(value) && !isClassConstructor(value)) {
    block = CodeBlock.fromFunction(value);
  } else {
    return value;
  }

  if (isString(paired)) {
    const result = block.invoke();
    if (result.success) return result.value;
  }
  return block.source.trim();
}
