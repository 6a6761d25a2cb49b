import { evaluateCodeBlockSource } from '../evaluator';
import { type StaticResult, resolved } from '../evaluator/constants';

type Thunk = () => unknown;

/**
 * An executable block of code, kept as source text.
 *
 * Two origins:
 * - `fromFunction`: wraps a live function. `source` is derived from the
 *   function text; `invoke()` calls the function.
 * - `fromSource`: wraps text only (what the literal extractor produces).
 *   `invoke()` evaluates the text statically and never runs it.
 *
 * `source` never includes the enclosing braces of the literal form.
 */
export class CodeBlock {
  readonly source: string;
  readonly #fn: Thunk | undefined;

  private constructor(source: string, fn?: Thunk) {
    this.source = source;
    this.#fn = fn;
  }

  static fromSource(source: string): CodeBlock {
    return new CodeBlock(source);
  }

  static fromFunction(fn: Thunk): CodeBlock {
    return new CodeBlock(Function.prototype.toString.call(fn), fn);
  }

  /**
   * Produces the block's result.
   *
   * @returns
   *   - `{ success: true, value }` with the function's return value, or with the
   *     statically evaluated value of a source-only block.
   *   - `{ success: false }` when a source-only block depends on runtime
   *     state.
   */
  invoke(): StaticResult {
    if (this.#fn) return resolved(this.#fn());
    return evaluateCodeBlockSource(this.source);
  }
}
