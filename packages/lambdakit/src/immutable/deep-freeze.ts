/**
 * Recursively readonly view of a type. Functions are left as they are.
 */
export type DeepReadonly<T> = T extends (...args: never[]) => unknown
  ? T
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * Freeze an object graph in place: the value, its array elements and its
 * own property values, recursively. Cycles are handled.
 *
 * Only objects and arrays are made immutable; Map, Set and Date instances
 * are frozen as objects but their contents stay mutable at runtime.
 *
 * @example
 * ```typescript
 * const settings = deepFreeze({ retries: 3, hosts: ['a', 'b'] });
 * Object.isFrozen(settings.hosts); // true
 * ```
 */
export function deepFreeze<T>(value: T): DeepReadonly<T> {
  freezeGraph(value, new WeakSet());
  // freezeGraph has frozen every reachable object, which is what DeepReadonly describes.
  return value as DeepReadonly<T>;
}

function freezeGraph(value: unknown, seen: WeakSet<object>): void {
  if (typeof value !== "object" || value === null || seen.has(value)) {
    return;
  }
  seen.add(value);
  for (const key of Reflect.ownKeys(value)) {
    freezeGraph(Reflect.get(value, key), seen);
  }
  Object.freeze(value);
}

/**
 * Check whether every object reachable from `value` is frozen.
 */
export function isDeepFrozen(value: unknown, seen: WeakSet<object> = new WeakSet()): boolean {
  if (typeof value !== "object" || value === null || seen.has(value)) {
    return true;
  }
  seen.add(value);
  if (!Object.isFrozen(value)) {
    return false;
  }
  return Reflect.ownKeys(value).every((key) => isDeepFrozen(Reflect.get(value, key), seen));
}
