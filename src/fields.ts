import { isValueCodec } from "./codec.js";
import { SchemaError } from "./errors.js";
import type {
  Describable,
  FieldAccessor,
  FieldInfo,
  FieldKind,
  FieldMap,
  TextAccessor,
  ValueCodec,
} from "./types.js";

type FieldName<T> = Extract<keyof T, string>;

export interface FieldDescriptor<T> {
  readonly name: string;
  readonly kind: FieldKind;
  bind(target: T): FieldAccessor;
}

// Decoding happens before assignment, so a rejected text never touches the field
function textAccessor<V>(
  codec: ValueCodec<V>,
  read: () => V,
  write: (value: V) => void
): TextAccessor {
  return {
    getText: () => codec.toText(read()),
    setText(text) {
      let value: V;
      try {
        value = codec.fromText(text);
      } catch {
        return false;
      }
      write(value);
      return true;
    },
  };
}

function leafDescriptor<T, K extends FieldName<T>>(
  name: K,
  codec: ValueCodec<T[K]>
): FieldDescriptor<T> {
  return {
    name,
    kind: "leaf",
    bind: (target) => ({
      kind: "leaf",
      name,
      ...textAccessor(
        codec,
        () => target[name],
        (value) => {
          target[name] = value;
        }
      ),
    }),
  };
}

function isPresent<V>(value: V): value is V & object {
  return typeof value === "object" && value !== null;
}

function nestedDescriptor<T, K extends FieldName<T>>(
  name: K,
  type: Describable<T[K]>
): FieldDescriptor<T> {
  const { fields, codec } = type;
  return {
    name,
    kind: "nested",
    bind: (target) => {
      const empty = !isPresent(target[name]);
      return {
        kind: "nested",
        name,
        empty,
        text:
          codec === undefined || empty
            ? undefined
            : textAccessor(
                codec,
                () => target[name],
                (value) => {
                  target[name] = value;
                }
              ),
        enter: () => {
          const value = target[name];
          return isPresent(value) ? fields.reflect(value) : undefined;
        },
      };
    },
  };
}

/**
 * The ordered, fixed list of fields a type exposes to reflection.
 * Built once per type with `defineFields`.
 */
export class FieldSet<T> {
  readonly #descriptors: readonly FieldDescriptor<T>[];

  constructor(descriptors: readonly FieldDescriptor<T>[]) {
    this.#descriptors = [...descriptors];
  }

  get names(): string[] {
    return this.#descriptors.map((descriptor) => descriptor.name);
  }

  get size(): number {
    return this.#descriptors.length;
  }

  describe(): FieldInfo[] {
    return this.#descriptors.map(({ name, kind }) => ({ name, kind }));
  }

  /**
   * Bind every declared field to `instance`. The map is a fresh snapshot on
   * each call.
   */
  reflect(instance: T): FieldMap {
    const members = new Map<string, FieldAccessor>();
    for (const descriptor of this.#descriptors) {
      members.set(descriptor.name, descriptor.bind(instance));
    }
    return members;
  }
}

export class FieldSetBuilder<T> {
  readonly #descriptors: FieldDescriptor<T>[] = [];

  leaf<K extends FieldName<T>>(name: K, codec: ValueCodec<T[K]>): this {
    if (!isValueCodec(codec)) {
      throw new SchemaError(`Field "${name}" needs a codec with toText and fromText`);
    }
    return this.#add(leafDescriptor(name, codec));
  }

  nested<K extends FieldName<T>>(name: K, type: Describable<T[K]>): this {
    if (!isDescribable(type)) {
      throw new SchemaError(`Field "${name}" must reference a type with declared fields`);
    }
    if (type.codec !== undefined && !isValueCodec(type.codec)) {
      throw new SchemaError(
        `Field "${name}" references a type whose codec lacks toText or fromText`
      );
    }
    return this.#add(nestedDescriptor(name, type));
  }

  build(): FieldSet<T> {
    return new FieldSet(this.#descriptors);
  }

  #add(descriptor: FieldDescriptor<T>): this {
    if (this.#descriptors.some((existing) => existing.name === descriptor.name)) {
      throw new SchemaError(`Field "${descriptor.name}" is declared twice`);
    }
    this.#descriptors.push(descriptor);
    return this;
  }
}

export function defineFields<T>(): FieldSetBuilder<T> {
  return new FieldSetBuilder<T>();
}

export function isDescribable(value: unknown): value is Describable<unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "fields" in value &&
    value.fields instanceof FieldSet
  );
}

export function reflect<T>(instance: T, fields: FieldSet<T>): FieldMap {
  return fields.reflect(instance);
}

/**
 * Reflect an instance through the field set declared on its class.
 * Returns undefined when the class declares none.
 */
export function reflectObject(instance: object): FieldMap | undefined {
  const type: unknown = instance.constructor;
  if (!isDescribable(type)) return undefined;
  return type.fields.reflect(instance);
}
