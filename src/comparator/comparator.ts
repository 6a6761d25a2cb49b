import { typeName } from '../classifier';
import { InvalidInputShapeError, MissingPropertyListError } from '../errors';
import { isArray, isPlainObject, isPropertyBagLike } from '../guards';
import { isCallable, isNullish, isString } from '../utils/type-guards';
import { CodeBlock, Credential } from '../values';
import { defaultMessages } from './messages';
import { normalizeCodeBlock, toPropertyBag } from './normalize';
import { type ComparisonOptions, resolveComparisonOptions } from './options';
import { planArrayComparison } from './strategies';
import type {
  MessageCatalog,
  PropertyBag,
  TraceOutcome,
  TraceSink
} from './types';
import { areScalarsEqual, areValuesEqual, formatValue } from './utils';

export type StateComparatorOptions = {
  /** Text of the trace lines. Defaults to {@link defaultMessages}. */
  messages?: MessageCatalog;
  /** Receives one entry per trace line. Defaults to discarding them. */
  sink?: TraceSink;
};

const discardEntry: TraceSink = () => undefined;

/**
 * Runtime type used by the type check, or `undefined` when the value has no
 * known type. Code blocks have none: they are compared through their result
 * or source text.
 */
function knownType(value: unknown): string | undefined {
  if (isNullish(value) || value instanceof CodeBlock || isCallable(value)) {
    return undefined;
  }
  return typeName(value);
}

function readOwn(bag: PropertyBag, key: string): unknown {
  return Object.hasOwn(bag, key) ? bag[key] : undefined;
}

function selectKeys(desired: PropertyBag, options: ComparisonOptions): string[] {
  const keys = options.restrictToProperties ?? Object.keys(desired);
  const excluded = options.excludeProperties ?? [];
  return [...new Set(keys)].filter(key => !excluded.includes(key));
}

/**
 * Decides whether a current state matches a desired state.
 *
 * Both states are property bags. Every selected key is compared:
 *
 * 1. Credentials: only the user name.
 * 2. Type check (unless `skipTypeChecking`).
 * 3. Fast equality.
 * 4. Keys absent from the desired bag match.
 * 5. Arrays: length, then element by element, optionally sorted.
 * 6. Nested maps: a recursive comparison without `restrictToProperties`.
 * 7. Everything else: scalar equality.
 *
 * A mismatch never stops the comparison. Every remaining key, nested map and
 * the reverse pass still run and write their trace lines; the verdict stays
 * `false` once it is `false`.
 *
 * Inputs are never modified: `Map`s and class instances are copied into plain
 * objects before anything is compared.
 */
export class StateComparator {
  readonly #messages: MessageCatalog;
  readonly #sink: TraceSink;

  constructor({ messages = defaultMessages, sink = discardEntry }: StateComparatorOptions = {}) {
    this.#messages = messages;
    this.#sink = sink;
  }

  /**
   * @returns `true` when every compared key is in the desired state.
   * @throws {InvalidInputShapeError} When either state is not a plain object,
   *   `Map` or class instance.
   * @throws {MissingPropertyListError} When `desired` is a class instance and
   *   no `restrictToProperties` is given.
   * @throws {InvalidOptionsError} When the options are invalid.
   */
  compare(
    current: unknown,
    desired: unknown,
    options: Partial<ComparisonOptions> = {}
  ): boolean {
    const resolved = resolveComparisonOptions(options);

    if (!isPropertyBagLike(current)) {
      throw new InvalidInputShapeError('current', typeName(current));
    }
    if (!isPropertyBagLike(desired)) {
      throw new InvalidInputShapeError('desired', typeName(desired));
    }
    if (
      resolved.restrictToProperties === undefined &&
      !isPlainObject(desired) &&
      !(desired instanceof Map)
    ) {
      throw new MissingPropertyListError(typeName(desired));
    }

    return this.#compareBags(toPropertyBag(current), toPropertyBag(desired), resolved, []);
  }

  #compareBags(
    current: PropertyBag,
    desired: PropertyBag,
    options: ComparisonOptions,
    path: string[]
  ): boolean {
    let inDesiredState = true;

    for (const key of selectKeys(desired, options)) {
      const matched = this.#compareKey(current, desired, key, options, [...path, key]);
      if (!matched) inDesiredState = false;
    }

    if (options.alsoCheckReverse) {
      this.#emit('info', path, this.#messages.reversePass());
      const reverse = this.#compareBags(
        desired,
        current,
        { ...options, alsoCheckReverse: false },
        path
      );
      if (!reverse) inDesiredState = false;
    }

    return inDesiredState;
  }

  #compareKey(
    current: PropertyBag,
    desired: PropertyBag,
    key: string,
    options: ComparisonOptions,
    path: string[]
  ): boolean {
    const currentValue = readOwn(current, key);
    const desiredValue = readOwn(desired, key);

    if (desiredValue instanceof Credential) {
      return this.#compareCredential(currentValue, desiredValue, path);
    }

    if (!options.skipTypeChecking && this.#typesDiffer(currentValue, desiredValue, path)) {
      return false;
    }

    if (!isArray(desiredValue) && areValuesEqual(currentValue, desiredValue)) {
      this.#emitComparison(true, path, currentValue, desiredValue);
      return true;
    }

    if (!Object.hasOwn(desired, key)) {
      this.#emit('info', path, this.#messages.keyAbsent(path.join('.')));
      return true;
    }

    if (isArray(desiredValue)) {
      return this.#compareArrays(currentValue, desiredValue, options, path);
    }

    if (isPlainObject(currentValue) && isPlainObject(desiredValue)) {
      return this.#compareNested(currentValue, desiredValue, options, path);
    }

    const currentScalar = normalizeCodeBlock(currentValue, desiredValue);
    const desiredScalar = normalizeCodeBlock(desiredValue, currentValue);
    const equal = areScalarsEqual(currentScalar, desiredScalar, options.skipTypeChecking);
    this.#emitComparison(equal, path, currentScalar, desiredScalar);
    return equal;
  }

  /** Only user names are compared; secrets never are. */
  #compareCredential(currentValue: unknown, desired: Credential, path: string[]): boolean {
    const property = path.join('.');
    const currentUserName = isString(currentValue)
      ? currentValue
      : currentValue instanceof Credential
        ? currentValue.userName
        : undefined;

    const equal = currentUserName === desired.userName;
    this.#sink({
      outcome: equal ? 'match' : 'no-match',
      path,
      message: equal
        ? this.#messages.credentialMatch(property, desired.userName)
        : this.#messages.credentialNoMatch(property, currentUserName, desired.userName),
      current: currentUserName,
      desired: desired.userName
    });
    return equal;
  }

  #typesDiffer(currentValue: unknown, desiredValue: unknown, path: string[]): boolean {
    const currentType = knownType(currentValue);
    const desiredType = knownType(desiredValue);
    if (currentType === undefined || desiredType === undefined) return false;
    if (currentType === desiredType) return false;

    this.#sink({
      outcome: 'no-match',
      path,
      message: this.#messages.typeMismatch(path.join('.'), currentType, desiredType),
      current: currentValue,
      desired: desiredValue
    });
    return true;
  }

  #compareArrays(
    currentValue: unknown,
    desired: unknown[],
    options: ComparisonOptions,
    path: string[]
  ): boolean {
    const plan = planArrayComparison(currentValue, desired, options);

    switch (plan.mode) {
      case 'match':
        this.#emitComparison(true, path, currentValue, desired);
        return true;

      case 'absent':
        this.#emitComparison(false, path, currentValue, desired);
        return false;

      case 'length':
        this.#sink({
          outcome: 'no-match',
          path,
          message: this.#messages.arrayLengthMismatch(
            path.join('.'),
            plan.currentLength,
            plan.desiredLength
          ),
          current: currentValue,
          desired
        });
        return false;

      case 'elements': {
        let inDesiredState = true;
        for (const [index, desiredItem] of plan.desired.entries()) {
          const matched = this.#compareElement(
            plan.current[index],
            desiredItem,
            index,
            options,
            path
          );
          if (!matched) inDesiredState = false;
        }
        this.#emitComparison(inDesiredState, path, currentValue, desired);
        return inDesiredState;
      }
    }
  }

  #compareElement(
    currentItem: unknown,
    desiredItem: unknown,
    index: number,
    options: ComparisonOptions,
    arrayPath: string[]
  ): boolean {
    const path = [...arrayPath, String(index)];

    if (!options.skipTypeChecking && this.#typesDiffer(currentItem, desiredItem, path)) {
      return false;
    }

    const current = normalizeCodeBlock(currentItem, desiredItem);
    const desired = normalizeCodeBlock(desiredItem, currentItem);

    if (isPlainObject(current) && isPlainObject(desired)) {
      return this.#compareNested(current, desired, options, path);
    }
    if (isArray(desired)) {
      return this.#compareArrays(current, desired, options, path);
    }

    const equal = areScalarsEqual(current, desired, options.skipTypeChecking);
    if (equal) {
      this.#emitComparison(true, path, current, desired);
    } else {
      this.#sink({
        outcome: 'no-match',
        path,
        message: this.#messages.arrayElementMismatch(
          arrayPath.join('.'),
          index,
          formatValue(current),
          formatValue(desired)
        ),
        current,
        desired
      });
    }
    return equal;
  }

  #compareNested(
    current: PropertyBag,
    desired: PropertyBag,
    options: ComparisonOptions,
    path: string[]
  ): boolean {
    return this.#compareBags(
      current,
      desired,
      { ...options, restrictToProperties: undefined },
      path
    );
  }

  #emitComparison(equal: boolean, path: string[], current: unknown, desired: unknown): void {
    const property = path.join('.');
    const currentText = formatValue(current);
    const desiredText = formatValue(desired);

    this.#sink({
      outcome: equal ? 'match' : 'no-match',
      path,
      message: equal
        ? this.#messages.valueMatch(property, currentText, desiredText)
        : this.#messages.valueNoMatch(property, currentText, desiredText),
      current,
      desired
    });
  }

  #emit(outcome: TraceOutcome, path: string[], message: string): void {
    this.#sink({ outcome, path, message });
  }
}
