import type { ParseDiagnostic } from '../errors';
import { isCompleteCodeBlock } from '../evaluator';
import { Cursor, isDelimiter, isInlineSpace, isNewline } from './cursor';
import type {
  BareWord,
  CallExpression,
  CastExpression,
  CodeBlockLiteral,
  CollectionLiteral,
  ConstantLiteral,
  LiteralNode,
  MapEntry,
  MapKeyNode,
  MapLiteral,
  NumberLiteral,
  ParenExpression,
  StringLiteral,
  SubExpression,
  TypeLiteral,
  VariableExpression
} from './types';

/**
 * Thrown to unwind the recursion after a fatal diagnostic was recorded.
 * Never escapes {@link LiteralParser.parseInvocation}.
 */
class ParseAbort extends Error {
  constructor() {
    super('parse aborted');
    this.name = 'ParseAbort';
  }
}

/** Backtick escapes of expandable strings. */
const ESCAPES: Readonly<Record<string, string>> = {
  '0': '\0',
  a: '\x07',
  b: '\b',
  e: '\x1b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v'
};

const NUMBER_PATTERN = /[+-]?(?:0x[0-9a-f]+|(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)/iy;
const BARE_WORD_PATTERN = /[^\s,;(){}[\]'"`#=|&<>$@]+/y;
const VARIABLE_NAME_PATTERN = /[A-Za-z0-9_:]+|[?^$]/y;
const INTERPOLATION_START = /[A-Za-z_{(?:]/;

/**
 * Recursive-descent parser for the literal argument language.
 *
 * The parser only builds a tree; it never evaluates anything. Fatal problems
 * (unterminated strings, unbalanced brackets, unexpected characters) record a
 * diagnostic and abort. Recoverable problems (duplicate map keys, empty type
 * names) record a diagnostic and parsing continues, so one pass reports all of
 * them.
 */
export class LiteralParser {
  readonly diagnostics: ParseDiagnostic[] = [];
  private readonly cursor: Cursor;

  constructor(source: string, origin: number) {
    this.cursor = new Cursor(source, origin);
  }

  /**
   * Parses `command arg arg ...` and returns the argument nodes.
   *
   * @returns
   *   The arguments, or `null` when a fatal diagnostic was recorded.
   */
  parseInvocation(command: string): LiteralNode[] | null {
    const cursor = this.cursor;

    try {
      if (!cursor.startsWith(command)) {
        this.fail(`Expected the command name "${command}"`);
      }
      cursor.advance(command.length);

      const args: LiteralNode[] = [];
      for (;;) {
        this.skipTrivia(true);
        if (cursor.atEnd()) break;

        const char = cursor.peek();
        if (char === ';' || char === ')' || char === '}' || char === ']' || char === '|' || char === '&') {
          this.fail(`Unexpected '${char}' in argument list`);
        }

        args.push(this.parseCommaList());

        const next = cursor.peek();
        if (!(next === '' || isInlineSpace(next) || isNewline(next) || next === '#')) {
          this.fail(`Unexpected '${next}' after argument`);
        }
      }

      return this.diagnostics.length > 0 ? null : args;
    } catch (error) {
      if (error instanceof ParseAbort) return null;
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  private report(message: string, pos = this.cursor.pos): void {
    this.diagnostics.push({ offset: this.cursor.offset(pos), message });
  }

  private fail(message: string, pos = this.cursor.pos): never {
    this.report(message, pos);
    throw new ParseAbort();
  }

  private expect(char: string, message: string, pos?: number): void {
    if (this.cursor.peek() !== char) this.fail(message, pos);
    this.cursor.advance();
  }

  // ---------------------------------------------------------------------------
  // Trivia
  // ---------------------------------------------------------------------------

  /**
   * Skips whitespace, comments and line continuations.
   *
   * @param newlines - Whether line breaks are trivia in the current position.
   * @param semicolons - Whether `;` is trivia (statement separators inside
   *   `@( )` and `@{ }`).
   */
  private skipTrivia(newlines: boolean, semicolons = false): void {
    const cursor = this.cursor;

    for (;;) {
      const char = cursor.peek();

      if (isInlineSpace(char) || (newlines && isNewline(char)) || (semicolons && char === ';')) {
        cursor.advance();
      } else if (char === '`' && isNewline(cursor.peek(1))) {
        cursor.advance(cursor.peek(1) === '\r' && cursor.peek(2) === '\n' ? 3 : 2);
      } else if (cursor.startsWith('<#')) {
        const start = cursor.pos;
        const close = cursor.source.indexOf('#>', start + 2);
        if (close === -1) this.fail("Missing '#>' at the end of a block comment", start);
        cursor.pos = close + 2;
      } else if (char === '#') {
        while (!cursor.atEnd() && !isNewline(cursor.peek())) cursor.advance();
      } else {
        return;
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  /**
   * `unary (',' unary)*`; a single operand is returned as-is. A line break may
   * follow a comma.
   */
  private parseCommaList(): LiteralNode {
    const cursor = this.cursor;
    const start = cursor.pos;
    const items = [this.parseUnary()];

    for (;;) {
      const save = cursor.pos;
      this.skipTrivia(false);
      if (cursor.peek() !== ',') {
        cursor.pos = save;
        break;
      }
      cursor.advance();
      this.skipTrivia(true);
      items.push(this.parseUnary());
    }

    const [first] = items;
    if (items.length === 1 && first) return first;

    const node: CollectionLiteral = {
      kind: 'CollectionLiteral',
      form: 'comma',
      items,
      ...cursor.extent(start)
    };
    return node;
  }

  /** `',' unary | '[' type ']' unary | primary` */
  private parseUnary(): LiteralNode {
    const cursor = this.cursor;
    const start = cursor.pos;

    if (cursor.peek() === ',') {
      cursor.advance();
      this.skipTrivia(false);
      const operand = this.parseUnary();
      const node: CollectionLiteral = {
        kind: 'CollectionLiteral',
        form: 'unary',
        items: [operand],
        ...cursor.extent(start)
      };
      return node;
    }

    if (cursor.peek() === '[') {
      return this.parseCast();
    }

    return this.parsePrimary();
  }

  private parseCast(): CastExpression | TypeLiteral {
    const cursor = this.cursor;
    const start = cursor.pos;
    cursor.advance();

    // Generic and array type names nest brackets: [string[]], [List[int]].
    let depth = 1;
    const nameStart = cursor.pos;
    while (depth > 0) {
      if (cursor.atEnd() || isNewline(cursor.peek())) {
        this.fail("Missing ']' at the end of a type name", start);
      }
      const char = cursor.peek();
      if (char === '[') depth += 1;
      if (char === ']') depth -= 1;
      cursor.advance();
    }
    const typeName = cursor.source.slice(nameStart, cursor.pos - 1).trim();
    if (typeName === '') this.report('Missing type name', start);

    // An operand follows after optional spaces; `,` only when it is adjacent
    // (`[Array],1`), since `[int], 2` is a list holding a type literal.
    const save = cursor.pos;
    this.skipTrivia(false);
    const next = cursor.peek();
    const hasOperand =
      next !== '' &&
      (!isDelimiter(next) ||
        next === '(' ||
        next === '{' ||
        next === '[' ||
        (next === ',' && cursor.pos === save));

    if (!hasOperand) {
      cursor.pos = save;
      const node: TypeLiteral = { kind: 'TypeLiteral', typeName, ...cursor.extent(start) };
      return node;
    }

    const operand = this.parseUnary();
    const node: CastExpression = {
      kind: 'CastExpression',
      typeName,
      operand,
      ...cursor.extent(start)
    };
    return node;
  }

  private parsePrimary(): LiteralNode {
    const cursor = this.cursor;
    const char = cursor.peek();
    const next = cursor.peek(1);

    switch (char) {
      case "'":
        return this.parseSingleQuoted();
      case '"':
        return this.parseDoubleQuoted();
      case '@':
        if (next === "'" || next === '"') return this.parseHereString();
        if (next === '{') return this.parseMap();
        if (next === '(') return this.parseArray();
        return this.fail("Unexpected '@'");
      case '$':
        if (next === '(') return this.parseSubExpression();
        return this.parseVariable();
      case '(':
        return this.parseParen();
      case '{':
        return this.parseCodeBlock();
      case '':
        return this.fail('Missing expression');
    }

    if (cursor.match(NUMBER_PATTERN) !== null) {
      const number = this.tryParseNumber();
      if (number) return number;
    }

    if (cursor.match(BARE_WORD_PATTERN) !== null) {
      return this.parseBareWordOrCall();
    }

    return this.fail(`Unexpected '${char}'`);
  }

  // ---------------------------------------------------------------------------
  // Strings
  // ---------------------------------------------------------------------------

  /** `'text'`; a doubled quote stands for one quote. */
  private parseSingleQuoted(): StringLiteral {
    const cursor = this.cursor;
    const start = cursor.pos;
    cursor.advance();

    let value = '';
    for (;;) {
      if (cursor.atEnd()) this.fail('Missing closing quote in string', start);
      const char = cursor.peek();
      if (char === "'") {
        if (cursor.peek(1) !== "'") {
          cursor.advance();
          break;
        }
        value += "'";
        cursor.advance(2);
        continue;
      }
      value += char;
      cursor.advance();
    }

    return {
      kind: 'StringLiteral',
      value,
      quoting: 'single',
      interpolated: false,
      ...cursor.extent(start)
    };
  }

  /**
   * Reads one character of expandable-string content at the cursor, handling
   * backtick escapes and noting variable references.
   */
  private readExpandableChar(state: { value: string; interpolated: boolean }): void {
    const cursor = this.cursor;
    const char = cursor.peek();

    if (char === '`' && cursor.pos + 1 < cursor.source.length) {
      const escaped = cursor.peek(1);
      state.value += ESCAPES[escaped] ?? escaped;
      cursor.advance(2);
      return;
    }

    if (char === '$' && INTERPOLATION_START.test(cursor.peek(1))) {
      state.interpolated = true;
    }

    state.value += char;
    cursor.advance();
  }

  /** `"text"` with backtick escapes; `""` stands for one quote. */
  private parseDoubleQuoted(): StringLiteral {
    const cursor = this.cursor;
    const start = cursor.pos;
    cursor.advance();

    const state = { value: '', interpolated: false };
    for (;;) {
      if (cursor.atEnd()) this.fail('Missing closing quote in string', start);
      if (cursor.peek() === '"') {
        if (cursor.peek(1) !== '"') {
          cursor.advance();
          break;
        }
        state.value += '"';
        cursor.advance(2);
        continue;
      }
      this.readExpandableChar(state);
    }

    return {
      kind: 'StringLiteral',
      value: state.value,
      quoting: 'double',
      interpolated: state.interpolated,
      ...cursor.extent(start)
    };
  }

  /**
   * `@'` or `@"`, a line break, the body, a line break, and the closing
   * `'@` / `"@` at the start of a line. The line breaks around the body are
   * not part of the text.
   */
  private parseHereString(): StringLiteral {
    const cursor = this.cursor;
    const start = cursor.pos;
    const quoteChar = cursor.peek(1);
    const terminator = `${quoteChar}@`;
    cursor.advance(2);

    while (isInlineSpace(cursor.peek())) cursor.advance();
    if (!isNewline(cursor.peek())) {
      this.fail('A here-string header must be followed by a line break', start);
    }
    cursor.advance(cursor.startsWith('\r\n') ? 2 : 1);

    const bodyStart = cursor.pos;
    let bodyEnd = bodyStart;
    let terminatorStart = bodyStart;

    if (!cursor.startsWith(terminator)) {
      const lineBreak = cursor.source.indexOf(`\n${terminator}`, bodyStart);
      if (lineBreak === -1) this.fail(`Missing '${terminator}' at the start of a line`, start);
      terminatorStart = lineBreak + 1;
      bodyEnd =
        lineBreak > bodyStart && cursor.source.charAt(lineBreak - 1) === '\r'
          ? lineBreak - 1
          : lineBreak;
    }

    const body = cursor.source.slice(bodyStart, bodyEnd);
    cursor.pos = terminatorStart + terminator.length;

    if (quoteChar === "'") {
      return {
        kind: 'StringLiteral',
        value: body,
        quoting: 'here-single',
        interpolated: false,
        ...cursor.extent(start)
      };
    }

    const inner = new LiteralParser(body, 0);
    const state = { value: '', interpolated: false };
    while (!inner.cursor.atEnd()) inner.readExpandableChar(state);

    return {
      kind: 'StringLiteral',
      value: state.value,
      quoting: 'here-double',
      interpolated: state.interpolated,
      ...cursor.extent(start)
    };
  }

  // ---------------------------------------------------------------------------
  // Containers
  // ---------------------------------------------------------------------------

  private parseMapKey(): MapKeyNode {
    const cursor = this.cursor;
    const char = cursor.peek();

    if (char === "'") return this.parseSingleQuoted();
    if (char === '"') return this.parseDoubleQuoted();

    const number = cursor.match(NUMBER_PATTERN) !== null ? this.tryParseNumber() : null;
    if (number) return number;

    const word = cursor.match(BARE_WORD_PATTERN);
    if (word !== null) {
      const start = cursor.pos;
      cursor.advance(word.length);
      const node: BareWord = { kind: 'BareWord', word, ...cursor.extent(start) };
      return node;
    }

    return this.fail('Missing key in map literal');
  }

  /** `@{ key = value; key = value }`, pairs separated by `;` or line breaks. */
  private parseMap(): MapLiteral {
    const cursor = this.cursor;
    const start = cursor.pos;
    cursor.advance(2);

    const entries: MapEntry[] = [];
    const seen = new Set<string>();

    for (;;) {
      this.skipTrivia(true, true);
      if (cursor.peek() === '}') {
        cursor.advance();
        break;
      }
      if (cursor.atEnd()) this.fail("Missing closing '}' in map literal", start);

      const key = this.parseMapKey();
      const keyText = key.kind === 'BareWord' ? key.word : String(key.value);
      if (seen.has(keyText)) {
        this.report(`Duplicate key '${keyText}' in map literal`, cursor.pos - key.text.length);
      }
      seen.add(keyText);

      this.skipTrivia(false);
      this.expect('=', "Missing '=' after a map key");
      this.skipTrivia(true);

      entries.push({ key, value: this.parseCommaList() });

      this.skipTrivia(false);
      const next = cursor.peek();
      if (next === '') this.fail("Missing closing '}' in map literal", start);
      if (next !== ';' && next !== '}' && !isNewline(next)) {
        this.fail(`Unexpected '${next}' in map literal`);
      }
    }

    return { kind: 'MapLiteral', entries, ...cursor.extent(start) };
  }

  /**
   * `@( statement; statement )`. A statement that is a comma list or a unary
   * comma contributes its items; any other statement is one item.
   */
  private parseArray(): CollectionLiteral {
    const cursor = this.cursor;
    const start = cursor.pos;
    cursor.advance(2);

    const items: LiteralNode[] = [];
    for (;;) {
      this.skipTrivia(true, true);
      if (cursor.peek() === ')') {
        cursor.advance();
        break;
      }
      if (cursor.atEnd()) this.fail("Missing closing ')' in array literal", start);

      const statement = this.parseCommaList();
      if (statement.kind === 'CollectionLiteral' && statement.form !== 'array') {
        items.push(...statement.items);
      } else {
        items.push(statement);
      }

      this.skipTrivia(false);
      const next = cursor.peek();
      if (next === '') this.fail("Missing closing ')' in array literal", start);
      if (next !== ';' && next !== ')' && !isNewline(next)) {
        this.fail(`Unexpected '${next}' in array literal`);
      }
    }

    return { kind: 'CollectionLiteral', form: 'array', items, ...cursor.extent(start) };
  }

  private parseParen(): ParenExpression {
    const cursor = this.cursor;
    const start = cursor.pos;
    cursor.advance();

    this.skipTrivia(true);
    if (cursor.peek() === ')') this.fail('Missing expression inside parentheses');

    const expression = this.parseCommaList();
    this.skipTrivia(true);
    this.expect(')', "Missing closing ')'", cursor.atEnd() ? start : undefined);

    return { kind: 'ParenExpression', expression, ...cursor.extent(start) };
  }

  /**
   * Skips a quoted run inside a code block or sub-expression. Backslash
   * escapes the next character inside code-block (script) strings.
   */
  private skipQuoted(quoteChar: string, backslashEscapes: boolean): void {
    const cursor = this.cursor;
    const start = cursor.pos;
    cursor.advance();

    for (;;) {
      if (cursor.atEnd()) this.fail('Missing closing quote in string', start);
      const char = cursor.peek();
      if (backslashEscapes && char === '\\') {
        cursor.advance(2);
        continue;
      }
      cursor.advance();
      if (char === quoteChar) return;
    }
  }

  /**
   * `{ source }`. The block ends at the first `}` before which the text is a
   * complete script. Text that never parses as one (a block written for
   * another host) falls back to brace counting, where braces inside quotes
   * and comments do not count.
   */
  private parseCodeBlock(): CodeBlockLiteral {
    const cursor = this.cursor;
    const start = cursor.pos;

    const close = this.findScriptEnd(start) ?? this.findBalancedBrace(start);
    cursor.pos = close + 1;

    return {
      kind: 'CodeBlockLiteral',
      source: cursor.source.slice(start + 1, close),
      ...cursor.extent(start)
    };
  }

  /** Offset of the `}` closing a block whose body is a complete script. */
  private findScriptEnd(start: number): number | null {
    const text = this.cursor.source;
    for (
      let close = text.indexOf('}', start + 1);
      close !== -1;
      close = text.indexOf('}', close + 1)
    ) {
      if (isCompleteCodeBlock(text.slice(start + 1, close))) return close;
    }
    return null;
  }

  private findBalancedBrace(start: number): number {
    const cursor = this.cursor;
    cursor.pos = start + 1;

    let depth = 1;
    while (depth > 0) {
      if (cursor.atEnd()) this.fail("Missing closing '}' in code block", start);

      const char = cursor.peek();
      if (char === "'" || char === '"' || char === '`') {
        this.skipQuoted(char, true);
      } else if (cursor.startsWith('//')) {
        while (!cursor.atEnd() && !isNewline(cursor.peek())) cursor.advance();
      } else if (cursor.startsWith('/*')) {
        const comment = cursor.source.indexOf('*/', cursor.pos + 2);
        if (comment === -1) this.fail("Missing '*/' in code block", cursor.pos);
        cursor.pos = comment + 2;
      } else {
        if (char === '{') depth += 1;
        if (char === '}') depth -= 1;
        cursor.advance();
      }
    }
    return cursor.pos - 1;
  }

  /** `$( ... )`, kept as an opaque node. */
  private parseSubExpression(): SubExpression {
    const cursor = this.cursor;
    const start = cursor.pos;
    cursor.advance(2);

    let depth = 1;
    while (depth > 0) {
      if (cursor.atEnd()) this.fail("Missing closing ')' in sub-expression", start);

      const char = cursor.peek();
      if (char === "'" || char === '"') {
        this.skipQuoted(char, false);
      } else {
        if (char === '(') depth += 1;
        if (char === ')') depth -= 1;
        cursor.advance();
      }
    }

    return { kind: 'SubExpression', ...cursor.extent(start) };
  }

  // ---------------------------------------------------------------------------
  // Atoms
  // ---------------------------------------------------------------------------

  /** `$name`, `${name}`; `$null`, `$true` and `$false` are constants. */
  private parseVariable(): ConstantLiteral | VariableExpression {
    const cursor = this.cursor;
    const start = cursor.pos;
    cursor.advance();

    let name: string;
    if (cursor.peek() === '{') {
      const close = cursor.source.indexOf('}', cursor.pos);
      if (close === -1) this.fail("Missing '}' at the end of a variable name", start);
      name = cursor.source.slice(cursor.pos + 1, close);
      cursor.pos = close + 1;
    } else {
      const word = cursor.match(VARIABLE_NAME_PATTERN);
      if (word === null) this.fail("Missing variable name after '$'", start);
      name = word;
      cursor.advance(word.length);
    }

    switch (name.toLowerCase()) {
      case 'null':
        return { kind: 'ConstantLiteral', value: null, ...cursor.extent(start) };
      case 'true':
        return { kind: 'ConstantLiteral', value: true, ...cursor.extent(start) };
      case 'false':
        return { kind: 'ConstantLiteral', value: false, ...cursor.extent(start) };
      default:
        return { kind: 'VariableExpression', name, ...cursor.extent(start) };
    }
  }

  /**
   * Numbers must end at a delimiter; `5abc` is a bare word, not a number
   * followed by a word.
   */
  private tryParseNumber(): NumberLiteral | null {
    const cursor = this.cursor;
    const raw = cursor.match(NUMBER_PATTERN);
    if (raw === null || !isDelimiter(cursor.source.charAt(cursor.pos + raw.length))) {
      return null;
    }

    const start = cursor.pos;
    cursor.advance(raw.length);

    const negative = raw.startsWith('-');
    const magnitude = Number(raw.replace(/^[+-]/, ''));
    return {
      kind: 'NumberLiteral',
      value: negative ? -magnitude : magnitude,
      ...cursor.extent(start)
    };
  }

  /** `word`, or `word(args)` when a parenthesis follows immediately. */
  private parseBareWordOrCall(): BareWord | CallExpression {
    const cursor = this.cursor;
    const start = cursor.pos;
    const word = cursor.match(BARE_WORD_PATTERN) ?? '';
    cursor.advance(word.length);

    if (cursor.peek() !== '(') {
      return { kind: 'BareWord', word, ...cursor.extent(start) };
    }

    cursor.advance();
    this.skipTrivia(true);

    let args: LiteralNode[] = [];
    if (cursor.peek() !== ')') {
      const list = this.parseCommaList();
      args = list.kind === 'CollectionLiteral' && list.form === 'comma' ? list.items : [list];
      this.skipTrivia(true);
    }
    this.expect(')', "Missing closing ')' in call", cursor.atEnd() ? start : undefined);

    return { kind: 'CallExpression', callee: word, args, ...cursor.extent(start) };
  }
}
