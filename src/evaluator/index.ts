import { is, type types } from 'estree-toolkit';

import { extractPropertyKey } from './key-extractor';
import { tryResolveStaticValue } from './static-resolver';
import { parseCodeBlockSource, type ParsedCodeBlock } from './parse';
import {
  SKIP_VALUE,
  type StaticResult,
  UNRESOLVED,
  resolved
} from './constants';

export { endsInLineComment, hasComment, isCompleteCodeBlock } from './parse';
export type { StaticResult } from './constants';

/**
 * Arrays -> STRICT POLICY
 *
 * - Rule: If *any* element is dynamic (including spreads), the **entire array**
 *   is rejected (returns `SKIP_VALUE`).
 * - Elisions: rejected as well. An evaluated configuration value has no use
 *   for sparse slots and they cannot be written back as literals.
 *
 * Control Flow:
 * Fail-fast. The first dynamic element aborts the array and the signal
 * propagates to the parent container, which aborts in turn.
 *
 * @param expressionNode
 *   The ArrayExpression node to decode.
 * @returns
 *   - The fully resolved static array.
 *   - `SKIP_VALUE` if any element was dynamic.
 */
function evaluateArrayExpression(
  expressionNode: types.ArrayExpression
): unknown[] | typeof SKIP_VALUE {
  const candidate: unknown[] = [];

  for (const elementNode of expressionNode.elements) {
    if (elementNode === null || is.spreadElement(elementNode)) {
      return SKIP_VALUE;
    }

    const evaluated = evaluateStaticExpression(elementNode);
    if (evaluated === SKIP_VALUE) {
      return SKIP_VALUE;
    }
    candidate.push(evaluated);
  }

  return candidate;
}

/**
 * Objects -> STRICT POLICY
 *
 * A code block's invocation result has to be the value the block would
 * really return, so a partially known object is no result at all. Any spread
 * or dynamic entry rejects the whole object.
 *
 * Methods, getters and setters are dynamic by construction and reject too.
 *
 * @param expressionNode
 *   The ObjectExpression node to decode.
 * @returns
 *   - The evaluated plain object.
 *   - `SKIP_VALUE` if any entry was dynamic.
 */
function evaluateObjectExpression(
  expressionNode: types.ObjectExpression
): Record<string, unknown> | typeof SKIP_VALUE {
  const aggregate: Record<string, unknown> = {};

  for (const propertyNode of expressionNode.properties) {
    if (is.spreadElement(propertyNode)) return SKIP_VALUE;
    if (propertyNode.kind !== 'init' || propertyNode.method) return SKIP_VALUE;

    const key = extractPropertyKey(propertyNode);
    if (key === null) return SKIP_VALUE;

    const evaluated = evaluateStaticExpression(propertyNode.value);
    if (evaluated === SKIP_VALUE) return SKIP_VALUE;

    aggregate[key] = evaluated;
  }

  return aggregate;
}

/**
 * Recursively decodes an ESTree node into a plain static JavaScript value.
 *
 * Communicates with callers via two signals:
 * - Data Payload: a valid JS value (primitive, array, object) indicates success.
 * - `SKIP_VALUE`: the node (or part of it) depends on runtime state.
 *
 * Any node not strictly resolvable as data (identifiers other than the global
 * constants, calls, member access, operators) falls through to `SKIP_VALUE`.
 *
 * @param expressionNode
 *   The AST node to decode.
 * @returns
 *   The evaluated value, or `SKIP_VALUE`.
 */
export function evaluateStaticExpression(expressionNode: types.Node): unknown {
  const staticResolution = tryResolveStaticValue(expressionNode);
  if (staticResolution.success) {
    return staticResolution.value;
  }

  if (is.arrayExpression(expressionNode)) {
    return evaluateArrayExpression(expressionNode);
  }

  if (is.objectExpression(expressionNode)) {
    return evaluateObjectExpression(expressionNode);
  }

  return SKIP_VALUE;
}

/**
 * Finds the expression whose value a statement list returns, if that can be
 * decided without control flow: the list must be exactly one `return`
 * statement with an argument.
 */
function findReturnedExpression(
  statements: readonly types.Statement[]
): types.Expression | null {
  const [only] = statements;
  if (statements.length !== 1 || !only) return null;
  if (!is.returnStatement(only) || !only.argument) return null;
  return only.argument;
}

/**
 * Picks the expression a parsed code block produces when invoked.
 *
 * - A zero-parameter function or arrow function produces its body (the
 *   expression body of an arrow, or the single `return` of a block body).
 * - Any other expression produces itself.
 * - A statement list produces the argument of its single `return`.
 */
function selectResultExpression(parsed: ParsedCodeBlock): types.Expression | null {
  if (parsed.kind === 'body') {
    return findReturnedExpression(parsed.statements);
  }

  const expression = parsed.expression;

  if (
    is.arrowFunctionExpression(expression) ||
    is.functionExpression(expression)
  ) {
    if (expression.params.length > 0 || expression.async || expression.generator) {
      return null;
    }
    if (is.blockStatement(expression.body)) {
      return findReturnedExpression(expression.body.body);
    }
    return expression.body;
  }

  return expression;
}

/**
 * Statically "invokes" a code block given only its source text.
 *
 * The source is parsed with meriyah and the resulting tree is inspected; no
 * part of it is ever executed. Only blocks whose result is a static constant
 * (literals, signed numbers, templates without dynamic parts, and arrays or
 * objects built from those) resolve.
 *
 * Examples:
 * - `() => 'svc'`                 -> 'svc'
 * - `return ['a', 'b']`           -> ['a', 'b']
 * - `function () { return -1 }`   -> -1
 * - `() => process.env.NAME`      -> UNRESOLVED
 *
 * @param source
 *   Code-block text without its enclosing braces.
 * @returns
 *   The evaluated value, or {@link UNRESOLVED}.
 */
export function evaluateCodeBlockSource(source: string): StaticResult {
  const parsed = parseCodeBlockSource(source);
  if (parsed === null) return UNRESOLVED;

  const resultExpression = selectResultExpression(parsed);
  if (resultExpression === null) return UNRESOLVED;

  const evaluated = evaluateStaticExpression(resultExpression);
  if (evaluated === SKIP_VALUE) return UNRESOLVED;

  return resolved(evaluated);
}
