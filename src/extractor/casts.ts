import { UnsupportedArgumentShapeError } from '../errors';
import { isArray } from '../guards';
import { isBoolean, isNumber, isString } from '../utils/type-guards';
import type { CastExpression, MapLiteral } from '../parser';

const INTEGER_TEXT = /^[+-]?(?:\d+|0x[0-9a-f]+)$/i;

/**
 * Callbacks into the literal walker, so cast conversion stays free of the
 * walker's recursion.
 */
export type CastOperands = {
  convert: () => unknown;
  convertMap: (map: MapLiteral) => Record<string, unknown>;
  convertOrderedMap: (map: MapLiteral) => Map<string | number, unknown>;
};

function toBigInt(value: unknown, text: string): bigint | undefined {
  if (isString(value) && INTEGER_TEXT.test(value.trim())) return BigInt(value.trim());
  if (isNumber(value) && INTEGER_TEXT.test(text)) return BigInt(text);
  if (isNumber(value) && Number.isSafeInteger(value)) return BigInt(value);
  return undefined;
}

/**
 * Applies a type cast to its operand.
 *
 * | cast                    | operand            | result            |
 * |-------------------------|--------------------|-------------------|
 * | `ordered`               | map literal        | `Map`             |
 * | `Object`, `hashtable`   | map literal        | plain object      |
 * | `Array`                 | anything           | array (wrapped)   |
 * | `string`                | string, number, bool | string          |
 * | `number`                | number, string     | number            |
 * | `bigint`                | integral number or string | bigint     |
 * | `boolean`               | boolean            | boolean           |
 * | `datetime`              | string             | `Date`            |
 *
 * Cast names are case-insensitive.
 *
 * @throws {UnsupportedArgumentShapeError} For any other cast or operand.
 */
export function applyCast(node: CastExpression, operands: CastOperands): unknown {
  const operand = node.operand;

  switch (node.typeName.toLowerCase()) {
    case 'ordered':
      if (operand.kind === 'MapLiteral') return operands.convertOrderedMap(operand);
      break;

    case 'object':
    case 'hashtable':
      if (operand.kind === 'MapLiteral') return operands.convertMap(operand);
      break;

    case 'array': {
      const value = operands.convert();
      return isArray(value) ? value : [value];
    }

    case 'string': {
      const value = operands.convert();
      if (isString(value)) return value;
      if (isNumber(value) || isBoolean(value)) return String(value);
      break;
    }

    case 'number': {
      const value = operands.convert();
      if (isNumber(value)) return value;
      if (isString(value)) return Number(value);
      break;
    }

    case 'bigint': {
      const value = toBigInt(operands.convert(), operand.text);
      if (value !== undefined) return value;
      break;
    }

    case 'boolean': {
      const value = operands.convert();
      if (isBoolean(value)) return value;
      break;
    }

    case 'datetime': {
      const value = operands.convert();
      if (isString(value)) return new Date(value);
      break;
    }
  }

  throw new UnsupportedArgumentShapeError(`Cast[${node.typeName}]`, node.text);
}
