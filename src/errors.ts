/**
 * Typed error hierarchy.
 *
 * Every error raised by this package extends {@link LiteralReconcileError} and
 * carries a machine-readable `code` next to the human-readable message.
 *
 * Mismatches between two states are never errors: the comparator reports them
 * as `false` plus trace entries. Errors are reserved for inputs the engine
 * cannot work with at all.
 */

const PREFIX = '[literal-reconcile]';

export type ErrorCode =
  | 'MALFORMED_LITERAL'
  | 'UNSUPPORTED_ARGUMENT_SHAPE'
  | 'INVALID_INPUT_SHAPE'
  | 'MISSING_PROPERTY_LIST'
  | 'INVALID_OPTIONS';

export class LiteralReconcileError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
    super(`${PREFIX} ${message}`, options);
    this.name = 'LiteralReconcileError';
    this.code = code;
  }
}

/**
 * A single problem reported by the literal parser.
 */
export type ParseDiagnostic = {
  /** Offset into the parsed argument text. */
  offset: number;
  message: string;
};

/**
 * The argument text could not be parsed as an argument list.
 *
 * No literals are produced for the input; `diagnostics` lists every parser
 * complaint with its offset relative to the caller's text.
 */
export class MalformedLiteralError extends LiteralReconcileError {
  readonly diagnostics: readonly ParseDiagnostic[];

  constructor(diagnostics: readonly ParseDiagnostic[]) {
    const detail = diagnostics
      .map(d => `${d.message} (at offset ${d.offset})`)
      .join('; ');
    super(`Argument text is not a valid literal list: ${detail}`, 'MALFORMED_LITERAL');
    this.name = 'MalformedLiteralError';
    this.diagnostics = diagnostics;
  }
}

/**
 * An argument parsed correctly but is not a literal value shape
 * (variable reference, sub-expression, call, bare word, ...).
 */
export class UnsupportedArgumentShapeError extends LiteralReconcileError {
  readonly shape: string;
  readonly text: string;

  constructor(shape: string, text: string) {
    super(
      `Unsupported argument shape "${shape}": ${JSON.stringify(text)}. Only string, number, map and array literals can be extracted.`,
      'UNSUPPORTED_ARGUMENT_SHAPE'
    );
    this.name = 'UnsupportedArgumentShapeError';
    this.shape = shape;
    this.text = text;
  }
}

export type InputRole = 'current' | 'desired';

/**
 * A comparator input is not a property-bag-like value.
 */
export class InvalidInputShapeError extends LiteralReconcileError {
  readonly role: InputRole;

  constructor(role: InputRole, typeName: string) {
    super(
      `The ${role} state must be a property bag (plain object, Map or class instance), received ${typeName}.`,
      'INVALID_INPUT_SHAPE'
    );
    this.name = 'InvalidInputShapeError';
    this.role = role;
  }
}

/**
 * A comparison against a source that cannot be safely enumerated was
 * requested without `restrictToProperties`.
 */
export class MissingPropertyListError extends LiteralReconcileError {
  constructor(typeName: string) {
    super(
      `Comparing against a desired state of type ${typeName} requires "restrictToProperties".`,
      'MISSING_PROPERTY_LIST'
    );
    this.name = 'MissingPropertyListError';
  }
}

export type OptionsIssue = {
  path: string;
  message: string;
};

/**
 * Options failed schema validation.
 */
export class InvalidOptionsError extends LiteralReconcileError {
  readonly issues: readonly OptionsIssue[];

  constructor(label: string, issues: readonly OptionsIssue[]) {
    const detail = issues
      .map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    super(`Invalid ${label}: ${detail}`, 'INVALID_OPTIONS');
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }
}
