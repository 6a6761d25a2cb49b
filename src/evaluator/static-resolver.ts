import { is, type types } from 'estree-toolkit';
import { type StaticResult, UNRESOLVED, resolved } from './constants';

/**
 * Resolves atomic values from ESTree `Literal` nodes.
 *
 * Supported Types:
 * - Primitives: `string`, `number`, `boolean`, `bigint`.
 * - Special Literals: `null`, `RegExp`.
 *
 * `null` and regex literals parse as `Literal` nodes even though they evaluate
 * to `typeof === 'object'`; the parser has already built the `RegExp`
 * instance and attached it to `node.value`.
 *
 * `Date` never reaches this function: there is no date literal syntax, dates
 * only appear as `NewExpression` nodes, which stay unresolved.
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   A `StaticResult`:
 *   - `success: true` when `node` is a supported `Literal` form
 *   - `success: false` otherwise
 */
export function tryResolveLiteral(node: types.Node): StaticResult {
  if (is.literal(node)) {
    switch (typeof node.value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'bigint':
        return resolved(node.value);

      case 'object':
        if (node.value === null) {
          return resolved(null);
        }
        if (node.value instanceof RegExp) {
          return resolved(node.value);
        }
        break;
    }
  }
  return UNRESOLVED;
}

/**
 * Resolves values from ESTree `Identifier` nodes that name global constants.
 *
 * Supported Values:
 * - `undefined`, `NaN`, `Infinity`.
 *
 * These are syntactically identifiers (variable names), but static analysis
 * treats them as constants. Any other identifier is a variable reference and
 * stays unresolved.
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   A `StaticResult`:
 *   - `success: true` when `node` is a supported global-constant identifier
 *   - `success: false` otherwise
 */
export function tryResolveIdentifier(node: types.Node): StaticResult {
  if (is.identifier(node)) {
    switch (node.name) {
      case 'undefined':
        return resolved(undefined);
      case 'NaN':
        return resolved(NaN);
      case 'Infinity':
        return resolved(Infinity);
    }
  }
  return UNRESOLVED;
}

/**
 * Resolves static template strings by stitching together text and static
 * values.
 *
 * ---
 *
 * 1. AST Structure (The "Bookend" Rule)
 *    A Template Literal always starts and ends with a Quasi (static text), so
 *    `quasis.length === expressions.length + 1`. Iterating over `quasis`
 *    covers every part in order, including the tail.
 *
 * 2. Escapes
 *    Resolution uses `cooked` (the interpreted text). Templates may contain
 *    invalid escapes, in which case `cooked` is undefined and the whole
 *    template is unresolved.
 *
 * 3. Interpolations (All-or-Nothing)
 *    Each `${...}` is resolved through {@link tryResolveStaticValue}; a single
 *    dynamic interpolation rejects the template.
 *    Values are stringified with `${}` so `null`/`undefined` become "null" /
 *    "undefined" as they would at runtime.
 *
 * Example:
 *    `v${ 1 }.${ 0 }` -> quasis ["v", ".", ""], expressions [1, 0] -> "v1.0"
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   A `StaticResult`:
 *   - `success: true` when the template and all interpolations are statically resolvable
 *   - `success: false` otherwise
 */
export function tryResolveTemplate(node: types.Node): StaticResult {
  if (is.templateLiteral(node)) {
    const parts: string[] = [];

    const expressions = node.expressions;

    for (const [index, quasi] of node.quasis.entries()) {
      const text = quasi.value.cooked;
      if (typeof text !== 'string') return UNRESOLVED;

      parts.push(text);

      if (index < expressions.length) {
        const expression = expressions[index];
        if (!expression) return UNRESOLVED;

        const result = tryResolveStaticValue(expression);

        if (!result.success) return UNRESOLVED;

        parts.push(`${result.value}`);
      }
    }

    return resolved(parts.join(''));
  }
  return UNRESOLVED;
}

/**
 * Resolves sign and `void` operators applied to static operands.
 *
 * Supported Operators:
 * - `-x`, `+x` where `x` resolves to a number (e.g. `-1`, `+Infinity`).
 * - `-x` where `x` resolves to a bigint (e.g. `-1n`).
 * - `void x` for any static `x` (evaluates to `undefined`).
 *
 * Negative numbers are not literals in ESTree: `-1` is a `UnaryExpression`
 * wrapping the literal `1`. Without this resolver a code block as simple as
 * `() => -1` could not be evaluated.
 *
 * Logical negation and `typeof` stay unresolved.
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   A `StaticResult` for supported unary forms; `success: false` otherwise.
 */
export function tryResolveUnary(node: types.Node): StaticResult {
  if (!is.unaryExpression(node)) return UNRESOLVED;

  const operand = tryResolveStaticValue(node.argument);
  if (!operand.success) return UNRESOLVED;

  const value = operand.value;

  switch (node.operator) {
    case '-':
      if (typeof value === 'number') return resolved(-value);
      if (typeof value === 'bigint') return resolved(-value);
      return UNRESOLVED;
    case '+':
      return typeof value === 'number' ? resolved(value) : UNRESOLVED;
    case 'void':
      return resolved(undefined);
    default:
      return UNRESOLVED;
  }
}

/**
 * Master Dispatcher: Static Value Resolution
 *
 * Resolves AST nodes that represent atomic static constants: primitives,
 * global constants, signed numbers and deterministic string composition.
 *
 * Still excluded (returns UNRESOLVED):
 * - Binary / logical operators (e.g. `1 + 1`, `a ?? 'b'`)
 * - Conditional expressions (e.g. `x ? 'a' : 'b'`)
 * - Sequence expressions (e.g. `(0, 10)`)
 * - Anything touching a variable, a call or a member access
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   A `StaticResult`:
 *   - `success: true` with the value the node evaluates to when a resolution strategy succeeds
 *   - `success: false` otherwise
 */
export function tryResolveStaticValue(node: types.Node): StaticResult {
  let result: StaticResult;

  // 1. Atomic Constants
  if ((result = tryResolveLiteral(node)).success) return result;
  if ((result = tryResolveIdentifier(node)).success) return result;

  // 2. Operators over constants
  if ((result = tryResolveUnary(node)).success) return result;

  // 3. String Interpolation
  if ((result = tryResolveTemplate(node)).success) return result;

  return UNRESOLVED;
}
