import { is, type types } from 'estree-toolkit';
import { tryResolveStaticValue } from './static-resolver';

/**
 * Extracts the static name from a property key defined as a non-computed
 * Identifier.
 *
 * In `{ retries: 3 }` the identifier `retries` is a label (the string
 * `"retries"`), not a variable reference. In `{ [retries]: 3 }` it is a
 * lookup and must go through the static resolver instead, which rejects it.
 *
 * This filter keeps the resolver from treating labels as variables: the
 * resolver would look `retries` up as a global constant, fail, and drop a
 * perfectly static key.
 *
 * @param property
 *   The property node to inspect.
 * @returns
 *   The identifier name if the key acts as a static label; otherwise null.
 */
function tryExtractNamedKey(property: types.Property): string | null {
  if (!property.computed && is.identifier(property.key)) {
    return property.key.name;
  }
  return null;
}

/**
 * Extracts the key of an object property so the evaluated object can be
 * built without running code.
 *
 * Pathways:
 * - [A] Labels: non-computed identifiers (`{ a: 1 }` -> `"a"`).
 * - [B] Data: literals and computed keys go through the shared static
 *   resolver, so `{ "a": 1 }`, `{ ["a"]: 1 }`, `{ [1]: 1 }` and
 *   ``{ [`id-${1}`]: 1 }`` resolve the same way their values would.
 *
 * Key Type Constraints:
 * Only `string` and `number` keys are accepted. Keys resolving to `null`,
 * `undefined`, booleans or bigints are rejected even though the runtime would
 * coerce them: in a configuration value such a key almost always signals an
 * unresolved variable.
 *
 * @param property
 *   The property node to inspect.
 * @returns
 *   The key if it is statically addressable; otherwise `null`.
 */
export function extractPropertyKey(
  property: types.Property
): string | number | null {
  // [A] Labels
  const namedKey = tryExtractNamedKey(property);
  if (namedKey !== null) {
    return namedKey;
  }

  // [B] Data Resolution
  const resolution = tryResolveStaticValue(property.key);

  if (resolution.success) {
    const resolvedValue = resolution.value;

    if (
      typeof resolvedValue === 'string' ||
      typeof resolvedValue === 'number'
    ) {
      return resolvedValue;
    }
  }

  return null;
}
