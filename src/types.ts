import type { FieldSet } from "./fields.js";

/**
 * Bidirectional text conversion for a leaf type.
 * `fromText` throws a ConversionError when the text is not a valid `T`.
 */
export interface ValueCodec<T> {
  toText(value: T): string;
  fromText(text: string): T;
}

export type FieldKind = "leaf" | "nested";

export interface TextAccessor {
  getText(): string;
  setText(text: string): boolean;
}

export interface LeafAccessor extends TextAccessor {
  readonly kind: "leaf";
  readonly name: string;
}

export interface NestedAccessor {
  readonly kind: "nested";
  readonly name: string;
  // The field holds null or a non-object
  readonly empty: boolean;
  // Present only when the nested type declares a whole-value codec and the
  // field is not empty
  readonly text: TextAccessor | undefined;
  enter(): FieldMap | undefined;
}

export type FieldAccessor = LeafAccessor | NestedAccessor;

// Ordered by declaration
export type FieldMap = ReadonlyMap<string, FieldAccessor>;

export interface FieldInfo {
  name: string;
  kind: FieldKind;
}

/**
 * Anything carrying a field set, usually a class through `static fields`.
 */
export interface Describable<T> {
  readonly fields: FieldSet<T>;
  readonly codec?: ValueCodec<T>;
}

export type FailureKind =
  | "MalformedCommand"
  | "ObjectNotFound"
  | "MemberNotFound"
  | "NonNavigableMember"
  | "ConversionFailure";

export interface CommandFailure {
  readonly kind: FailureKind;
  readonly message: string;
}

export type Command =
  | { op: "get"; path: string }
  | { op: "set"; path: string; value: string };

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; error: CommandFailure };

export type CommandResult =
  | { ok: true; value: string }
  | { ok: false; error: CommandFailure };

export type LogFn = (message: string) => void;
