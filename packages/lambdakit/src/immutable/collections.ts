/**
 * Unmodifiable collections.
 *
 * Lists are Proxies over a private array, so index access and every
 * non-mutating Array method keep working; writes, in-place methods and
 * `length` changes throw UnsupportedOperationError. Sets and maps are
 * wrappers that implement ReadonlySet / ReadonlyMap and throw from
 * add/set/delete/clear.
 */

import { UnsupportedOperationError } from "../errors";

const IN_PLACE_ARRAY_METHODS: ReadonlySet<PropertyKey> = new Set([
  "push",
  "pop",
  "shift",
  "unshift",
  "splice",
  "sort",
  "reverse",
  "fill",
  "copyWithin",
]);

function rejectMutation(operation: string): never {
  throw new UnsupportedOperationError({ operation });
}

function readOnlyArrayHandler<T>(): ProxyHandler<T[]> {
  return {
    get(target, property, receiver) {
      if (IN_PLACE_ARRAY_METHODS.has(property)) {
        return () => rejectMutation(String(property));
      }
      return Reflect.get(target, property, receiver);
    },
    set(_target, property) {
      return rejectMutation(`set [${String(property)}]`);
    },
    defineProperty(_target, property) {
      return rejectMutation(`defineProperty [${String(property)}]`);
    },
    deleteProperty(_target, property) {
      return rejectMutation(`delete [${String(property)}]`);
    },
    setPrototypeOf() {
      return rejectMutation("setPrototypeOf");
    },
  };
}

/**
 * An unmodifiable list of the given items.
 *
 * @example
 * ```typescript
 * const primes = listOf(2, 3, 5);
 * primes.map((n) => n * 2); // [4, 6, 10]
 * // primes.push(7) does not compile; forced at runtime it throws UnsupportedOperationError
 * ```
 */
export function listOf<T>(...items: T[]): ReadonlyArray<T> {
  return new Proxy(items.slice(), readOnlyArrayHandler<T>());
}

/**
 * An unmodifiable copy of an iterable. Later changes to the source are not
 * reflected.
 */
export function copyOf<T>(items: Iterable<T>): ReadonlyArray<T> {
  return new Proxy(Array.from(items), readOnlyArrayHandler<T>());
}

/**
 * A read-only view over a live array. Writes through the view throw;
 * writes to the backing array show through.
 *
 * @example
 * ```typescript
 * const backing = [1, 2, 3];
 * const view = unmodifiableView(backing);
 * backing.push(4);
 * view.length; // 4
 * ```
 */
export function unmodifiableView<T>(backing: T[]): ReadonlyArray<T> {
  return new Proxy(backing, readOnlyArrayHandler<T>());
}

/**
 * Set whose mutators throw UnsupportedOperationError.
 */
export class ImmutableSet<T> implements ReadonlySet<T> {
  private readonly items: Set<T>;

  constructor(items: Iterable<T>) {
    this.items = new Set(items);
    Object.freeze(this);
  }

  get size(): number {
    return this.items.size;
  }

  has(value: T): boolean {
    return this.items.has(value);
  }

  forEach(callback: (value: T, value2: T, set: ReadonlySet<T>) => void, thisArg?: unknown): void {
    this.items.forEach((value) => callback.call(thisArg, value, value, this));
  }

  entries() {
    return this.items.entries();
  }

  keys() {
    return this.items.keys();
  }

  values() {
    return this.items.values();
  }

  [Symbol.iterator]() {
    return this.items.values();
  }

  add(_value: T): never {
    return rejectMutation("add");
  }

  delete(_value: T): never {
    return rejectMutation("delete");
  }

  clear(): never {
    return rejectMutation("clear");
  }
}

/**
 * Map whose mutators throw UnsupportedOperationError.
 */
export class ImmutableMap<K, V> implements ReadonlyMap<K, V> {
  private readonly entriesByKey: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    this.entriesByKey = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  has(key: K): boolean {
    return this.entriesByKey.has(key);
  }

  get(key: K): V | undefined {
    return this.entriesByKey.get(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.entriesByKey.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries() {
    return this.entriesByKey.entries();
  }

  keys() {
    return this.entriesByKey.keys();
  }

  values() {
    return this.entriesByKey.values();
  }

  [Symbol.iterator]() {
    return this.entriesByKey.entries();
  }

  set(_key: K, _value: V): never {
    return rejectMutation("set");
  }

  delete(_key: K): never {
    return rejectMutation("delete");
  }

  clear(): never {
    return rejectMutation("clear");
  }
}

/**
 * An unmodifiable set of the given items, in insertion order.
 */
export function setOf<T>(...items: T[]): ImmutableSet<T> {
  return new ImmutableSet(items);
}

/**
 * An unmodifiable map of the given entries, in insertion order.
 */
export function mapOf<K, V>(entries: Iterable<readonly [K, V]>): ImmutableMap<K, V> {
  return new ImmutableMap(entries);
}
