import { is, type types } from 'estree-toolkit';
import { parse } from 'meriyah';
import { isArray, isRecord } from '../guards';

/**
 * Checks whether a runtime value is “node-like” enough to be treated as an ESTree node
 * for the purpose of `estree-toolkit` type guards.
 *
 * This is a shallow bridge guard between meriyah's own node typings and the
 * `estree` typings `estree-toolkit` works with:
 * - ensures the value is an object (not null)
 * - excludes arrays
 * - ensures a string `type` discriminator exists
 */
function isNodeLike(value: unknown): value is types.Node {
  return isRecord(value) && !isArray(value) && typeof value.type === 'string';
}

type CommentListener = () => void;

/**
 * Parses `code` as a classic script and returns the Program node, or `null`
 * when the text is not valid JavaScript.
 *
 * meriyah reports syntax errors by throwing; for code-block sources that is an
 * expected outcome (the block may be written for another host), so the error
 * becomes a `null` result here.
 */
function parseProgram(
  code: string,
  onComment?: CommentListener
): types.Program | null {
  let ast: unknown;
  try {
    ast = parse(code, { next: true, onComment });
  } catch {
    return null;
  }

  if (!isNodeLike(ast) || !is.program(ast)) return null;
  return ast;
}

/**
 * The two shapes a code-block source may take.
 *
 * - `expression`: the source is a single expression, e.g. `() => 'svc'` or
 *   `'svc'`.
 * - `body`: the source is a statement list, e.g. `return 'svc'`.
 */
export type ParsedCodeBlock =
  | { kind: 'expression'; expression: types.Expression }
  | { kind: 'body'; statements: types.Statement[] };

/**
 * Parses code-block source text without executing it.
 *
 * Strategy:
 * 1. Expression form: the source is wrapped in parentheses so object
 *    literals and functions parse as expressions. A newline precedes the
 *    closing parenthesis so a trailing line comment cannot swallow it.
 * 2. Body form: the source is wrapped as the body of an anonymous function,
 *    which admits statements including `return`.
 *
 * @param source
 *   Code-block text without its enclosing braces.
 * @param onComment
 *   Optional listener invoked once per comment found while parsing.
 * @returns
 *   The parsed form, or `null` if neither wrapping parses.
 */
export function parseCodeBlockSource(
  source: string,
  onComment?: CommentListener
): ParsedCodeBlock | null {
  const asExpression = parseProgram(`(${source}\n)`, onComment);
  const [statement] = asExpression?.body ?? [];
  if (
    asExpression?.body.length === 1 &&
    statement &&
    is.expressionStatement(statement)
  ) {
    return { kind: 'expression', expression: statement.expression };
  }

  const asBody = parseProgram(`(function () {\n${source}\n})`, onComment);
  const [wrapper] = asBody?.body ?? [];
  if (
    wrapper &&
    is.expressionStatement(wrapper) &&
    is.functionExpression(wrapper.expression)
  ) {
    return { kind: 'body', statements: wrapper.expression.body.body };
  }

  return null;
}

/**
 * Reports whether code-block source text contains a comment.
 *
 * A block whose source ends in a line comment would swallow the closing `}`
 * once it is written back between braces, so the serializer appends a newline
 * when this returns `true`.
 *
 * Source text that does not parse is reported as commented: the extra newline
 * is harmless and nothing can be proven about the text.
 *
 * @param source
 *   Code-block text without its enclosing braces.
 */
export function hasComment(source: string): boolean {
  let commentCount = 0;
  const parsed = parseCodeBlockSource(source, () => {
    commentCount += 1;
  });
  if (parsed === null) return true;
  return commentCount > 0;
}

/**
 * Reports whether code-block source text ends inside a line comment, where a
 * closing `}` written right after it would be commented out.
 *
 * Text that ends in code cannot be followed by `*` `/`: the slash would open a
 * regular expression running into the line break. Text that ends in a line
 * comment still parses with both characters appended.
 */
export function endsInLineComment(source: string): boolean {
  return (
    parseCodeBlockSource(source) !== null &&
    parseCodeBlockSource(`${source}*/`) !== null
  );
}

/**
 * Reports whether `source` is a complete code-block body: it parses, and a
 * `}` placed right after it would close the block rather than sit in a
 * comment.
 */
export function isCompleteCodeBlock(source: string): boolean {
  return (
    parseCodeBlockSource(source) !== null &&
    parseCodeBlockSource(`${source}*/`) === null
  );
}
