import type { RenderContext } from './context';

/** Placeholder written where the depth limit stops descent. */
export const DEPTH_PLACEHOLDER = "'...'";

/**
 * Single-quoted literal. The only escape is a doubled quote.
 */
export function quote(text: string): string {
  return `'${text.replaceAll("'", "''")}'`;
}

/**
 * A here-string body ends at the first line starting with `'@`, and the line
 * break before the terminator is not part of the text. Text that would be cut
 * short or lose a trailing `\r` this way cannot use the form.
 */
function fitsHereString(text: string): boolean {
  return !/(^|[\r\n])'@/.test(text) && !text.endsWith('\r');
}

/**
 * Writes a string literal.
 *
 * Single-line text is single-quoted. Multi-line text uses the here-string form
 * so embedded line breaks are kept verbatim:
 *
 * ```
 * @'
 * first line
 * second line
 * '@
 * ```
 */
export function renderStringLiteral(
  text: string,
  multiline: boolean,
  context: RenderContext
): string {
  if (multiline && fitsHereString(text)) {
    return `@'${context.newline}${text}${context.newline}'@`;
  }
  return quote(text);
}
