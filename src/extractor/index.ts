import { LiteralReconcileError, MalformedLiteralError } from '../errors';
import { parseArgumentList } from '../parser';
import { TOP_LEVEL_SCOPE, convertNode } from './literal-walker';

export { stripEnclosingBraces } from './literal-walker';

export type ExtractResult =
  | { success: true; value: unknown[] }
  | { success: false; error: LiteralReconcileError };

/**
 * Reconstructs literal values from argument text without evaluating it.
 *
 * The text is parsed as the argument list of a synthetic invocation; the
 * resulting syntax tree is walked read-only. One value is produced per
 * argument:
 *
 * - strings, numbers, `$true`, `$false`, `$null`: their values
 * - `@( ... )`, comma lists, `,x`: arrays
 * - `@{ ... }`: plain objects in source key order; `[ordered]@{ ... }`: `Map`
 * - code blocks inside maps: {@link CodeBlock} with the enclosing braces
 *   stripped
 * - `[datetime]'...'`: `Date`; other supported casts convert their operand
 *
 * @example
 *   extractArguments("'svc' @{ Retries = 3; Run = { 'x' } }");
 *   // ['svc', { Retries: 3, Run: CodeBlock(" 'x' ") }]
 *
 * @param text
 *   Untrusted argument text.
 * @returns
 *   One value per argument.
 * @throws {MalformedLiteralError} When the text does not parse; no partial
 *   result is produced.
 * @throws {UnsupportedArgumentShapeError} When an argument is not a literal
 *   (variable reference, sub-expression, call, bare word, unsupported cast).
 */
export function extractArguments(text: string): unknown[] {
  const parsed = parseArgumentList(text);
  if (!parsed.success) {
    throw new MalformedLiteralError(parsed.diagnostics);
  }
  return parsed.arguments.map(node => convertNode(node, TOP_LEVEL_SCOPE));
}

/**
 * Non-throwing variant of {@link extractArguments}.
 *
 * Only errors raised by this package become `{ success: false }`; anything
 * else propagates.
 */
export function tryExtractArguments(text: string): ExtractResult {
  try {
    return { success: true, value: extractArguments(text) };
  } catch (error) {
    if (error instanceof LiteralReconcileError) {
      return { success: false, error };
    }
    throw error;
  }
}
