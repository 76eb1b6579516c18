/**
 * Maps identifiers to live instances without owning them. Entries hold weak
 * references; a collected instance reads as absent and its entry is pruned.
 *
 * Not safe for concurrent mutation and lookup without external locking.
 */
export class ObjectRegistry<T extends object> {
  readonly #entries = new Map<string, WeakRef<T>>();

  /** Last registration for an identifier wins. */
  register(id: string, instance: T): void {
    this.#entries.set(id, new WeakRef(instance));
  }

  unregister(id: string): boolean {
    return this.#entries.delete(id);
  }

  lookup(id: string): T | undefined {
    const ref = this.#entries.get(id);
    if (!ref) return undefined;

    const instance = ref.deref();
    if (instance === undefined) {
      this.#entries.delete(id);
    }
    return instance;
  }

  has(id: string): boolean {
    return this.lookup(id) !== undefined;
  }

  ids(): string[] {
    return [...this.#entries.keys()].filter((id) => this.has(id));
  }

  get size(): number {
    return this.ids().length;
  }
}

// One registry per class, created on first use
const registries = new WeakMap<object, ObjectRegistry<object>>();

export function registryOf(type: object): ObjectRegistry<object> {
  let registry = registries.get(type);
  if (!registry) {
    registry = new ObjectRegistry();
    registries.set(type, registry);
  }
  return registry;
}

/**
 * Look up `id` in the registry of `type`, narrowed to its instances.
 */
export function lookupInstance<T extends object>(
  type: abstract new (...args: never[]) => T,
  id: string
): T | undefined {
  const instance = registries.get(type)?.lookup(id);
  return instance instanceof type ? instance : undefined;
}
