/**
 * Source extent of a node, relative to the argument text handed to the
 * parser (not to the synthetic invocation around it).
 */
export type Extent = {
  start: number;
  end: number;
  /** The exact source text of the node. */
  text: string;
};

export type StringLiteral = Extent & {
  kind: 'StringLiteral';
  value: string;
  quoting: 'single' | 'double' | 'here-single' | 'here-double';
  /** An expandable string referencing a variable or sub-expression. */
  interpolated: boolean;
};

export type NumberLiteral = Extent & {
  kind: 'NumberLiteral';
  value: number;
};

export type ConstantLiteral = Extent & {
  kind: 'ConstantLiteral';
  value: null | boolean;
};

export type BareWord = Extent & {
  kind: 'BareWord';
  word: string;
};

export type MapKeyNode = StringLiteral | NumberLiteral | BareWord;

export type MapEntry = {
  key: MapKeyNode;
  value: LiteralNode;
};

/** `@{ key = value; ... }`, entries in source order. */
export type MapLiteral = Extent & {
  kind: 'MapLiteral';
  entries: MapEntry[];
};

/**
 * A sequence.
 *
 * - `array`: `@( ... )`
 * - `comma`: `a, b, c`
 * - `unary`: `,a`
 */
export type CollectionLiteral = Extent & {
  kind: 'CollectionLiteral';
  form: 'array' | 'comma' | 'unary';
  items: LiteralNode[];
};

/** `{ ... }`; `source` is the text between the braces. */
export type CodeBlockLiteral = Extent & {
  kind: 'CodeBlockLiteral';
  source: string;
};

/** `[TypeName]operand` */
export type CastExpression = Extent & {
  kind: 'CastExpression';
  typeName: string;
  operand: LiteralNode;
};

/** `( ... )` */
export type ParenExpression = Extent & {
  kind: 'ParenExpression';
  expression: LiteralNode;
};

/** `[TypeName]` with nothing to cast. */
export type TypeLiteral = Extent & {
  kind: 'TypeLiteral';
  typeName: string;
};

/** `$name` */
export type VariableExpression = Extent & {
  kind: 'VariableExpression';
  name: string;
};

/** `$( ... )` */
export type SubExpression = Extent & {
  kind: 'SubExpression';
};

/** `Name(arg, ...)` */
export type CallExpression = Extent & {
  kind: 'CallExpression';
  callee: string;
  args: LiteralNode[];
};

/**
 * Every node the parser produces.
 *
 * The extractor accepts the literal kinds and rejects `VariableExpression`,
 * `SubExpression`, `CallExpression`, `BareWord` and `TypeLiteral`.
 */
export type LiteralNode =
  | StringLiteral
  | NumberLiteral
  | ConstantLiteral
  | MapLiteral
  | CollectionLiteral
  | CodeBlockLiteral
  | CastExpression
  | ParenExpression
  | TypeLiteral
  | VariableExpression
  | SubExpression
  | CallExpression
  | BareWord;

export type NodeKind = LiteralNode['kind'];
