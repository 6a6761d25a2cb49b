import { UnsupportedArgumentShapeError } from '../errors';
import type { LiteralNode, MapKeyNode, MapLiteral } from '../parser';
import { endsInLineComment } from '../evaluator';
import { CodeBlock } from '../values';
import { applyCast } from './casts';

/**
 * Where the walker currently is.
 *
 * Code blocks are data only inside a map (`@{ Run = { ... } }`); anywhere
 * else an argument made of a code block would be a script, not a value.
 */
type Scope = {
  insideMap: boolean;
};

/**
 * Removes one pair of braces wrapping the whole text, if present.
 *
 * `{ a }` becomes ` a `; `{{ a }}` becomes `{ a }`, so a block whose source
 * itself starts and ends with braces survives a write/read cycle unchanged.
 */
export function stripEnclosingBraces(text: string): string {
  return text.length >= 2 && text.startsWith('{') && text.endsWith('}')
    ? text.slice(1, -1)
    : text;
}

/**
 * Code block from its literal text. The line break a writer puts after a
 * trailing line comment, so the closing brace is not commented out, is not
 * part of the source.
 */
function readCodeBlock(text: string): CodeBlock {
  const source = stripEnclosingBraces(text);
  const withoutBreak = source.replace(/\r?\n$/, '');
  return CodeBlock.fromSource(
    withoutBreak !== source && endsInLineComment(withoutBreak) ? withoutBreak : source
  );
}

function reject(node: LiteralNode | MapKeyNode, shape: string = node.kind): never {
  throw new UnsupportedArgumentShapeError(shape, node.text);
}

function convertKey(key: MapKeyNode): string | number {
  switch (key.kind) {
    case 'BareWord':
      return key.word;
    case 'NumberLiteral':
      return key.value;
    case 'StringLiteral':
      if (key.interpolated) reject(key, 'ExpandableString');
      return key.value;
  }
}

function convertEntries(
  map: MapLiteral,
  scope: Scope
): Array<[string | number, unknown]> {
  const inner: Scope = { ...scope, insideMap: true };
  return map.entries.map(({ key, value }): [string | number, unknown] => [
    convertKey(key),
    value.kind === 'CodeBlockLiteral'
      ? readCodeBlock(value.text)
      : convertNode(value, inner)
  ]);
}

/**
 * Plain object in source key order. `Object.fromEntries` defines every key as
 * an own property, `__proto__` included.
 */
function convertMap(map: MapLiteral, scope: Scope): Record<string, unknown> {
  return Object.fromEntries(
    convertEntries(map, scope).map(([key, value]): [string, unknown] => [String(key), value])
  );
}

function convertOrderedMap(
  map: MapLiteral,
  scope: Scope
): Map<string | number, unknown> {
  return new Map(convertEntries(map, scope));
}

/**
 * Rebuilds the value a literal node denotes. Read-only walk; nothing is
 * evaluated.
 *
 * @throws {UnsupportedArgumentShapeError} For variables, sub-expressions,
 *   calls, bare words, type literals, interpolated strings, unsupported casts
 *   and code blocks outside a map.
 */
export function convertNode(node: LiteralNode, scope: Scope): unknown {
  switch (node.kind) {
    case 'StringLiteral':
      if (node.interpolated) reject(node, 'ExpandableString');
      return node.value;

    case 'NumberLiteral':
    case 'ConstantLiteral':
      return node.value;

    case 'MapLiteral':
      return convertMap(node, scope);

    case 'CollectionLiteral':
      return node.items.map(item => convertNode(item, scope));

    case 'ParenExpression':
      return convertNode(node.expression, scope);

    case 'CastExpression':
      return applyCast(node, {
        convert: () => convertNode(node.operand, scope),
        convertMap: map => convertMap(map, scope),
        convertOrderedMap: map => convertOrderedMap(map, scope)
      });

    case 'CodeBlockLiteral':
      if (!scope.insideMap) reject(node);
      return readCodeBlock(node.text);

    case 'TypeLiteral':
    case 'VariableExpression':
    case 'SubExpression':
    case 'CallExpression':
    case 'BareWord':
      return reject(node);
  }
}

export const TOP_LEVEL_SCOPE: Scope = { insideMap: false };
