import type { Document } from 'yaml';

/**
 * Fields every category carries.
 *
 * - `typeName`: the runtime type name (`typeof` for primitives, the
 *   constructor name for objects, `Object` for null-prototype objects).
 * - `tag`: the cast written in front of the literal when a tag is shown, or
 *   `null` for categories that never take one.
 * - `tagRequired`: whether weak typing must still show the tag because the
 *   literal alone would read back as a different type.
 */
type CategoryBase = {
  typeName: string;
  tag: string | null;
  tagRequired: boolean;
};

export type NullCategory = CategoryBase & { kind: 'null' };

export type BooleanCategory = CategoryBase & {
  kind: 'boolean';
  value: boolean;
};

/** Quoted text whose tag is shown only under strong typing. */
export type TaggedStringCategory = CategoryBase & {
  kind: 'taggedString';
  text: string;
};

/** Unquoted numeral. */
export type NumberCategory = CategoryBase & {
  kind: 'number';
  text: string;
};

export type StringCategory = CategoryBase & {
  kind: 'string';
  value: string;
  multiline: boolean;
};

export type SecureCategory = CategoryBase & {
  kind: 'secure';
  plainText: string;
};

export type CredentialCategory = CategoryBase & {
  kind: 'credential';
  userName: string;
  secret: string;
};

export type DateCategory = CategoryBase & {
  kind: 'date';
  /** ISO-8601 text, or `'Invalid Date'`. */
  text: string;
};

export type EnumCategory = CategoryBase & {
  kind: 'enum';
  value: number;
  /** Member name; absent for flag combinations and namespaced types. */
  name: string | undefined;
};

export type CodeBlockCategory = CategoryBase & {
  kind: 'codeBlock';
  source: string;
  commented: boolean;
};

export type HandleCategory = CategoryBase & {
  kind: 'handle';
  value: number;
};

export type DocumentCategory = CategoryBase & {
  kind: 'document';
  document: Document;
};

/** Quoted text whose tag is always shown. */
export type ScalarCategory = CategoryBase & {
  kind: 'scalar';
  text: string;
};

export type MapKey = string | number;

export type MapCategory = CategoryBase & {
  kind: 'map';
  entries: Array<[MapKey, unknown]>;
};

export type SequenceCategory = CategoryBase & {
  kind: 'sequence';
  items: unknown[];
  /** Typed arrays: numeric elements only, always rendered inline. */
  primitive: boolean;
};

/**
 * Closed union of everything the serializer knows how to write.
 *
 * Produced by `classify`; the serializer switches on `kind` and never inspects
 * the original value again except through the fields carried here.
 */
export type Category =
  | NullCategory
  | BooleanCategory
  | TaggedStringCategory
  | NumberCategory
  | StringCategory
  | SecureCategory
  | CredentialCategory
  | DateCategory
  | EnumCategory
  | CodeBlockCategory
  | HandleCategory
  | DocumentCategory
  | ScalarCategory
  | MapCategory
  | SequenceCategory;

export type CategoryKind = Category['kind'];
