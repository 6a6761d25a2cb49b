import { z } from 'zod';

import { validateWithSchema } from '../validator';

/**
 * Serializer options schema.
 *
 * - `maxDepth`: containers reached at this depth render as the `'...'`
 *   placeholder.
 * - `expand`: expansion threshold. Containers at `depth >= expand - 1` render
 *   inline; a negative value selects compact output (no optional spaces).
 * - `indentSize` / `indentChar`: one indentation level is `indentChar`
 *   repeated `indentSize` times.
 * - `strong`: write every type tag.
 * - `explore`: structural inspection; drops type tags unless `strong` is set.
 * - `newline`: line separator for expanded containers and multi-line strings.
 */
export const serializeOptionsSchema = z
  .object({
    maxDepth: z.number().int().min(0),
    expand: z.number().int(),
    indentSize: z.number().int().min(0),
    indentChar: z.string().length(1),
    strong: z.boolean(),
    explore: z.boolean(),
    newline: z.enum(['\n', '\r\n'])
  })
  .strict();

export type SerializeOptions = z.infer<typeof serializeOptionsSchema>;

export const DEFAULT_SERIALIZE_OPTIONS: Readonly<SerializeOptions> = {
  maxDepth: 9,
  expand: 9,
  indentSize: 1,
  indentChar: '\t',
  strong: false,
  explore: false,
  newline: '\n'
};

/**
 * Merges the provided partial options with the serializer defaults.
 *
 * Default settings:
 * - `maxDepth`: `9`
 * - `expand`: `9`
 * - `indentSize`: `1`, `indentChar`: tab
 * - `strong`: `false`, `explore`: `false`
 * - `newline`: `'\n'`
 *
 * @param options - The user-provided partial options.
 * @returns A complete options object with all fields initialized.
 */
export function normalizeSerializeOptions(
  options: Partial<SerializeOptions>
): SerializeOptions {
  return {
    ...DEFAULT_SERIALIZE_OPTIONS,
    ...options
  };
}

/**
 * Merges defaults and validates the result.
 *
 * @throws {InvalidOptionsError} When any option is out of range.
 */
export function resolveSerializeOptions(
  options: Partial<SerializeOptions> = {}
): SerializeOptions {
  return validateWithSchema(
    serializeOptionsSchema,
    normalizeSerializeOptions(options),
    'serialize options'
  );
}
