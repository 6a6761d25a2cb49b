import type { SerializeOptions } from './options';

/**
 * Rendering state threaded through the recursion.
 *
 * Built once per top-level call. Every descent produces a fresh context with
 * `currentDepth + 1` and its own `isListItem`; nothing is mutated.
 */
export type RenderContext = Readonly<{
  currentDepth: number;
  maxDepth: number;
  expansionThreshold: number;
  indentUnit: number;
  indentChar: string;
  strongTyping: boolean;
  exploreMode: boolean;
  newline: string;
  /** The value is an element of a sequence literal. */
  isListItem: boolean;
}>;

export function createRenderContext(options: SerializeOptions): RenderContext {
  return {
    currentDepth: 0,
    maxDepth: options.maxDepth,
    expansionThreshold: options.expand,
    indentUnit: options.indentSize,
    indentChar: options.indentChar,
    strongTyping: options.strong,
    exploreMode: options.explore,
    newline: options.newline,
    isListItem: false
  };
}

export function descend(context: RenderContext, isListItem: boolean): RenderContext {
  return { ...context, currentDepth: context.currentDepth + 1, isListItem };
}

/** Leading whitespace of a line at `depth`. */
export function indentation(context: RenderContext, depth: number): string {
  return context.indentChar.repeat(context.indentUnit * depth);
}

/** Negative expansion thresholds select compact output. */
export function isCompact(context: RenderContext): boolean {
  return context.expansionThreshold < 0;
}

/** Containers at or past this depth render on one line. */
export function isInline(context: RenderContext): boolean {
  return context.currentDepth >= context.expansionThreshold - 1;
}

export function isDepthExhausted(context: RenderContext): boolean {
  return context.currentDepth >= context.maxDepth;
}
