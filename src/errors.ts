export type ErrorKind =
  | "InvalidSchema"
  | "EmptyIdentifier"
  | "ObjectDisposed"
  | "ConversionFailure";

export class FieldscopeError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** A field declaration or dispatcher configuration was rejected. */
export class SchemaError extends FieldscopeError {
  constructor(message: string) {
    super("InvalidSchema", message);
  }
}

export class IdentifierError extends FieldscopeError {
  constructor(message = "Object ID cannot be empty") {
    super("EmptyIdentifier", message);
  }
}

export class ObjectDisposedError extends FieldscopeError {
  readonly id: string;

  constructor(id: string) {
    super("ObjectDisposed", `Object ${id} has been disposed`);
    this.id = id;
  }
}

/** Thrown by a codec when text is not a valid representation of its type. */
export class ConversionError extends FieldscopeError {
  readonly text: string;

  constructor(text: string, reason: string) {
    super("ConversionFailure", `Cannot convert "${text}": ${reason}`);
    this.text = text;
  }
}
