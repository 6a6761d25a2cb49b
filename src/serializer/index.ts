import { createRenderContext } from './context';
import { type SerializeOptions, resolveSerializeOptions } from './options';
import { renderValue } from './render';

export type { SerializeOptions } from './options';
export {
  DEFAULT_SERIALIZE_OPTIONS,
  normalizeSerializeOptions,
  serializeOptionsSchema
} from './options';

/**
 * A serializer bound to validated options.
 */
export type Serializer = (value: unknown) => string;

/**
 * Validates `options` once and returns a serializer that reuses them.
 *
 * @throws {InvalidOptionsError} When any option is out of range.
 */
export function createSerializer(
  options: Partial<SerializeOptions> = {}
): Serializer {
  const context = createRenderContext(resolveSerializeOptions(options));
  return value => renderValue(value, context).trimEnd();
}

/**
 * Converts a value into literal expression text that the extractor can read
 * back.
 *
 * Pure: the same value and options always produce the same text.
 *
 * @example
 *   serialize({ Name: 'svc', Retries: 3 }, { expand: 2 });
 *   // @{
 *   //   'Name' = 'svc'
 *   //   'Retries' = 3
 *   // }
 *
 * @param value
 *   Any value. Unknown shapes fall back to maps or sequences.
 * @param options
 *   Partial options; missing fields take the defaults.
 * @returns
 *   The literal text with trailing whitespace removed.
 * @throws {InvalidOptionsError} When any option is out of range.
 */
export function serialize(
  value: unknown,
  options: Partial<SerializeOptions> = {}
): string {
  return createSerializer(options)(value);
}
