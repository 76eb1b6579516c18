// Types
export type {
  Command,
  CommandFailure,
  CommandResult,
  Describable,
  FailureKind,
  FieldAccessor,
  FieldInfo,
  FieldKind,
  FieldMap,
  LeafAccessor,
  LogFn,
  NestedAccessor,
  ParseResult,
  TextAccessor,
  ValueCodec,
} from "./types.js";
// Errors
export {
  ConversionError,
  type ErrorKind,
  FieldscopeError,
  IdentifierError,
  ObjectDisposedError,
  SchemaError,
} from "./errors.js";
// Codecs
export * as codecs from "./codec.js";
export { isValueCodec, textCodec } from "./codec.js";
// Field declaration and reflection
export {
  defineFields,
  type FieldDescriptor,
  FieldSet,
  FieldSetBuilder,
  isDescribable,
  reflect,
  reflectObject,
} from "./fields.js";
// Registry and lifecycle
export { lookupInstance, ObjectRegistry, registryOf } from "./registry.js";
export {
  IdentifierSchema,
  isReflectableClass,
  Reflectable,
  type ReflectableClass,
} from "./reflectable.js";
// Command dispatch
export {
  createDispatcher,
  Dispatcher,
  type DispatcherOptions,
  parseCommand,
} from "./dispatcher.js";
