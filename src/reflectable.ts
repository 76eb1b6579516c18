import { z } from "zod";
import { IdentifierError, ObjectDisposedError } from "./errors.js";
import { FieldSet } from "./fields.js";
import { registryOf } from "./registry.js";
import type { Describable } from "./types.js";

export const IdentifierSchema = z.string().min(1, "Object ID cannot be empty");

function requireIdentifier(id: string): string {
  const result = IdentifierSchema.safeParse(id);
  if (!result.success) {
    throw new IdentifierError(result.error.issues[0]?.message);
  }
  return result.data;
}

type Lifecycle = "detached" | "registered" | "disposed";

/**
 * Base class for objects addressable by identifier. `create` constructs the
 * instance and registers it in its class's registry once every constructor has
 * returned, `rename` moves the entry and `dispose` removes it. Dispose an
 * object before abandoning it.
 *
 * An instance built with `new` directly stays detached: it carries its
 * identifier but nothing resolves it.
 */
export abstract class Reflectable implements Disposable {
  #id: string;
  #state: Lifecycle = "detached";

  protected constructor(id: string) {
    this.#id = requireIdentifier(id);
  }

  static create<T extends Reflectable, A extends unknown[]>(
    this: new (...args: A) => T,
    ...args: A
  ): T {
    const created = new this(...args);
    const instance: Reflectable = created;
    instance.#attach();
    return created;
  }

  get id(): string {
    return this.#id;
  }

  get registered(): boolean {
    return this.#state === "registered";
  }

  get disposed(): boolean {
    return this.#state === "disposed";
  }

  rename(id: string): void {
    const next = requireIdentifier(id);
    if (this.#state === "disposed") {
      throw new ObjectDisposedError(this.#id);
    }
    if (this.#state === "registered") {
      const registry = registryOf(this.constructor);
      registry.unregister(this.#id);
      registry.register(next, this);
    }
    this.#id = next;
  }

  dispose(): void {
    if (this.#state === "disposed") return;
    if (this.#state === "registered") {
      registryOf(this.constructor).unregister(this.#id);
    }
    this.#state = "disposed";
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  #attach(): void {
    registryOf(this.constructor).register(this.#id, this);
    this.#state = "registered";
  }
}

export type ReflectableClass<T extends Reflectable = Reflectable> = (abstract new (
  ...args: never[]
) => T) &
  Describable<T>;

export function isReflectableClass(value: unknown): value is ReflectableClass {
  if (typeof value !== "function") return false;
  const prototype: unknown = value.prototype;
  return prototype instanceof Reflectable && "fields" in value && value.fields instanceof FieldSet;
}
