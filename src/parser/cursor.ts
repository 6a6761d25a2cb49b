import type { Extent } from './types';

const INLINE_SPACE = new Set([' ', '\t', '\f', '\v', '\u00a0']);

/**
 * Characters that end a number or a bare word.
 */
const DELIMITERS = new Set([',', ';', '(', ')', '{', '}', '[', ']', '=', '#', '|', '&']);

export function isInlineSpace(char: string): boolean {
  return INLINE_SPACE.has(char);
}

export function isNewline(char: string): boolean {
  return char === '\n' || char === '\r';
}

export function isDelimiter(char: string): boolean {
  return char === '' || isInlineSpace(char) || isNewline(char) || DELIMITERS.has(char);
}

/**
 * Read position over the synthetic invocation source.
 *
 * `origin` is where the caller's text starts inside `source`; every offset
 * handed out (node extents, diagnostics) is relative to it.
 */
export class Cursor {
  readonly source: string;
  readonly origin: number;
  pos: number;

  constructor(source: string, origin: number) {
    this.source = source;
    this.origin = origin;
    this.pos = 0;
  }

  /** The character at `pos + ahead`, or `''` past the end. */
  peek(ahead = 0): string {
    return this.source.charAt(this.pos + ahead);
  }

  atEnd(): boolean {
    return this.pos >= this.source.length;
  }

  advance(count = 1): void {
    this.pos += count;
  }

  startsWith(text: string): boolean {
    return this.source.startsWith(text, this.pos);
  }

  /**
   * Matches a sticky regular expression at the current position without
   * consuming it.
   */
  match(pattern: RegExp): string | null {
    pattern.lastIndex = this.pos;
    const result = pattern.exec(this.source);
    return result ? result[0] : null;
  }

  /** Offset relative to the caller's text. */
  offset(pos = this.pos): number {
    return pos - this.origin;
  }

  /** Extent from `start` (absolute) to the current position. */
  extent(start: number): Extent {
    return {
      start: this.offset(start),
      end: this.offset(),
      text: this.source.slice(start, this.pos)
    };
  }
}
