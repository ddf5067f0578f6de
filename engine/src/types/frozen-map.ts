/**
 * Read-only view over a private copy of a map. Unlike a `Map` typed as
 * `ReadonlyMap`, it has no `set`, `delete` or `clear` to reach at runtime.
 */
export class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  private readonly store: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    this.store = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.store.size;
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.store.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.store.entries();
  }

  keys() {
    return this.store.keys();
  }

  values() {
    return this.store.values();
  }

  [Symbol.iterator]() {
    return this.store[Symbol.iterator]();
  }
}
