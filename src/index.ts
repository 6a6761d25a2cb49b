export { QUOTED_TAG, classify, typeName } from './classifier';
export type { Category, MapKey } from './classifier';

export {
  DEFAULT_SERIALIZE_OPTIONS,
  createSerializer,
  serialize
} from './serializer';
export type { SerializeOptions, Serializer } from './serializer';

export { parseArgumentList } from './parser';
export type { LiteralNode, ParseResult } from './parser';

export { extractArguments, tryExtractArguments } from './extractor';
export type { ExtractResult } from './extractor';

export {
  StateComparator,
  compareStates,
  defaultMessages,
  statesEqual
} from './comparator';
export type {
  ComparisonOptions,
  ComparisonReport,
  MessageCatalog,
  PropertyBag,
  StateComparatorOptions,
  TraceEntry,
  TraceOutcome,
  TraceSink
} from './comparator';

export {
  CodeBlock,
  Credential,
  Enumeration,
  SecureValue
} from './values';
export type { EnumObject } from './values';

export {
  InvalidInputShapeError,
  InvalidOptionsError,
  LiteralReconcileError,
  MalformedLiteralError,
  MissingPropertyListError,
  UnsupportedArgumentShapeError
} from './errors';
export type { ErrorCode, OptionsIssue, ParseDiagnostic } from './errors';
