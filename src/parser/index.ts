import type { ParseDiagnostic } from '../errors';
import { LiteralParser } from './parser';
import type { LiteralNode } from './types';

export type * from './types';

/**
 * Name of the command the argument text is attached to. It is never run and
 * never resolved; it only gives the text the position of an argument list.
 */
export const SYNTHETIC_COMMAND = '__extract__';

export type ParseResult =
  | { success: true; arguments: LiteralNode[] }
  | { success: false; diagnostics: ParseDiagnostic[] };

/**
 * Parses argument text as the argument list of a synthetic invocation
 * (`__extract__ <text>`) and returns one syntax tree per argument.
 *
 * Arguments are separated by whitespace, line breaks included; a comma list
 * (`'a', 'b'`) is a single argument. Node extents and diagnostic offsets are
 * relative to `text`.
 *
 * @example
 *   parseArgumentList("'svc' @{ Retries = 3 }");
 *   // { success: true, arguments: [StringLiteral, MapLiteral] }
 *
 * @param text
 *   Argument text; nothing in it is executed.
 * @returns
 *   The argument trees, or every diagnostic the parser recorded.
 */
export function parseArgumentList(text: string): ParseResult {
  const prefix = `${SYNTHETIC_COMMAND} `;
  const parser = new LiteralParser(`${prefix}${text}`, prefix.length);
  const args = parser.parseInvocation(SYNTHETIC_COMMAND);

  if (args === null) {
    return { success: false, diagnostics: parser.diagnostics };
  }
  return { success: true, arguments: args };
}
