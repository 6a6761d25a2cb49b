import { classify } from '../classifier';
import type {
  Category,
  MapCategory,
  MapKey,
  SequenceCategory
} from '../classifier';
import {
  type RenderContext,
  descend,
  indentation,
  isCompact,
  isDepthExhausted,
  isInline
} from './context';
import { DEPTH_PLACEHOLDER, quote, renderStringLiteral } from './strings';

/**
 * Type tag written in front of a literal, or `''`.
 *
 * | mode                | tags written        |
 * |---------------------|---------------------|
 * | strong (+/- explore) | every non-null tag |
 * | explore             | none                |
 * | weak                | required tags only  |
 */
function castPrefix(category: Category, context: RenderContext): string {
  if (category.tag === null) return '';
  if (context.strongTyping) return `[${category.tag}]`;
  if (context.exploreMode) return '';
  return category.tagRequired ? `[${category.tag}]` : '';
}

function renderKey(key: MapKey): string {
  return typeof key === 'number' && Number.isFinite(key)
    ? String(key)
    : quote(String(key));
}

/**
 * Writes an expanded container: the opening token on the current line, one
 * item per line one level deeper, and the closing token back at the
 * container's own level.
 */
function renderExpanded(
  open: string,
  lines: string[],
  close: string,
  context: RenderContext
): string {
  const itemIndent = indentation(context, context.currentDepth + 1);
  const closeIndent = indentation(context, context.currentDepth);

  return [
    open,
    ...lines.map(line => `${itemIndent}${line}`),
    `${closeIndent}${close}`
  ].join(context.newline);
}

/**
 * Map literal.
 *
 * - no pairs: `@{}`
 * - compact: `@{'a'=1;'b'=2}`
 * - one pair, or at/after the expansion threshold: `@{'a' = 1; 'b' = 2}`
 * - otherwise one `'key' = value` per line
 */
function renderMap(category: MapCategory, context: RenderContext): string {
  const prefix = castPrefix(category, context);
  if (category.entries.length === 0) return `${prefix}@{}`;

  const child = descend(context, false);
  const pairs = category.entries.map(
    ([key, value]) => [renderKey(key), renderValue(value, child)] as const
  );

  if (isCompact(context)) {
    return `${prefix}@{${pairs.map(([key, value]) => `${key}=${value}`).join(';')}}`;
  }

  const lines = pairs.map(([key, value]) => `${key} = ${value}`);

  if (pairs.length === 1 || isInline(context)) {
    return `${prefix}@{${lines.join('; ')}}`;
  }

  return renderExpanded(`${prefix}@{`, lines, '}', context);
}

/**
 * Sequence literal.
 *
 * - no items: `@()`
 * - one item: `,item`, or `(,item)` inside another sequence or behind a type
 *   tag, so that reading it back yields a one-element array, not the item
 * - primitive arrays, or at/after the expansion threshold: `@(a, b)`
 *   (`@(a,b)` when compact)
 * - otherwise one item per line
 */
function renderSequence(category: SequenceCategory, context: RenderContext): string {
  const prefix = castPrefix(category, context);
  if (category.items.length === 0) return `${prefix}@()`;

  const child = descend(context, true);
  const items = category.items.map(item => renderValue(item, child));

  const [only] = items;
  if (items.length === 1 && only !== undefined) {
    return context.isListItem || prefix ? `${prefix}(,${only})` : `,${only}`;
  }

  if (category.primitive || isInline(context)) {
    return `${prefix}@(${items.join(isCompact(context) ? ',' : ', ')})`;
  }

  return renderExpanded(`${prefix}@(`, items, ')', context);
}

/**
 * Renders one category. Containers past the depth limit become the
 * placeholder; everything else is written in full.
 */
function renderCategory(category: Category, context: RenderContext): string {
  const prefix = castPrefix(category, context);

  switch (category.kind) {
    case 'null':
      return '$null';

    case 'boolean':
      return `${prefix}${category.value ? '$true' : '$false'}`;

    case 'number':
      return `${prefix}${category.text}`;

    case 'taggedString':
    case 'scalar':
    case 'date':
      return `${prefix}${quote(category.text)}`;

    case 'string':
      return `${prefix}${renderStringLiteral(category.value, category.multiline, context)}`;

    case 'secure':
      return `Secure(${quote(category.plainText)})`;

    case 'credential':
      return `Credential(${quote(category.userName)}, Secure(${quote(category.secret)}))`;

    case 'enum':
      return category.name === undefined
        ? `${prefix}${category.value}`
        : `${prefix}${quote(category.name)}`;

    case 'codeBlock': {
      // A trailing comment would swallow the closing brace.
      const breakLine = category.commented && !/[\r\n]$/.test(category.source);
      return `{${category.source}${breakLine ? context.newline : ''}}`;
    }

    case 'handle':
      return String(category.value);

    case 'document': {
      const text = category.document.toString({
        indent: Math.max(1, context.indentUnit)
      });
      return renderStringLiteral(text, /[\r\n]/.test(text), context);
    }

    case 'map':
      if (isDepthExhausted(context)) return DEPTH_PLACEHOLDER;
      return renderMap(category, context);

    case 'sequence':
      if (isDepthExhausted(context)) return DEPTH_PLACEHOLDER;
      return renderSequence(category, context);
  }
}

/**
 * Classifies `value` and renders it as literal expression text.
 */
export function renderValue(value: unknown, context: RenderContext): string {
  return renderCategory(classify(value), context);
}
