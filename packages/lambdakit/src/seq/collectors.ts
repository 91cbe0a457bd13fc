/**
 * lambdakit/seq - Collectors
 *
 * Mutable-reduction recipes for `Seq.collect`. A collector creates a fresh
 * accumulator for every run, so one collector value can be reused.
 */

import type { Fn, Predicate, BinaryOperator } from "../functional";
import { IllegalStateError } from "../errors";
import { copyOf } from "../immutable/collections";

/**
 * A mutable reduction: create the accumulator, fold each element into it,
 * then turn it into the result.
 */
export interface Collector<T, A, R> {
  supplier: () => A;
  accumulator: (container: A, item: T) => void;
  finisher: (container: A) => R;
}

/** Mutable cell used as a per-key accumulator. */
export interface Holder<T> {
  value: T;
}

/** Result of `partitioningBy`. */
export interface Partition<T> {
  true: T[];
  false: T[];
}

function toArray<T>(): Collector<T, T[], T[]> {
  return {
    supplier: () => [],
    accumulator: (items, item) => {
      items.push(item);
    },
    finisher: (items) => items,
  };
}

function toFrozenArray<T>(): Collector<T, T[], ReadonlyArray<T>> {
  return { ...toArray<T>(), finisher: (items) => copyOf(items) };
}

function toSet<T>(): Collector<T, Set<T>, Set<T>> {
  return {
    supplier: () => new Set<T>(),
    accumulator: (set, item) => {
      set.add(item);
    },
    finisher: (set) => set,
  };
}

/**
 * Concatenate elements as strings.
 *
 * @example
 * ```typescript
 * Seq.of('a', 'b', 'c').collect(Collectors.joining(', ', '[', ']')); // '[a, b, c]'
 * ```
 */
function joining(separator = "", prefix = "", suffix = ""): Collector<unknown, string[], string> {
  return {
    supplier: () => [],
    accumulator: (parts, item) => {
      parts.push(String(item));
    },
    finisher: (parts) => prefix + parts.join(separator) + suffix,
  };
}

function counting(): Collector<unknown, { count: number }, number> {
  return {
    supplier: () => ({ count: 0 }),
    accumulator: (state) => {
      state.count++;
    },
    finisher: (state) => state.count,
  };
}

function summing<T>(fn: Fn<T, number>): Collector<T, { sum: number }, number> {
  return {
    supplier: () => ({ sum: 0 }),
    accumulator: (state, item) => {
      state.sum += fn(item);
    },
    finisher: (state) => state.sum,
  };
}

/**
 * Arithmetic mean of `fn` over the elements; 0 when there are none.
 */
function averaging<T>(fn: Fn<T, number>): Collector<T, { sum: number; count: number }, number> {
  return {
    supplier: () => ({ sum: 0, count: 0 }),
    accumulator: (state, item) => {
      state.sum += fn(item);
      state.count++;
    },
    finisher: (state) => (state.count === 0 ? 0 : state.sum / state.count),
  };
}

/**
 * Group elements by key. Keys keep first-seen order; each group is reduced
 * with `downstream` (an array by default).
 *
 * @example
 * ```typescript
 * Seq.of('ant', 'bee', 'cat', 'bear')
 *   .collect(Collectors.groupingBy((w) => w[0], Collectors.counting()));
 * // Map { 'a' => 1, 'b' => 2, 'c' => 1 }
 * ```
 */
function groupingBy<T, K>(keyFn: Fn<T, K>): Collector<T, Map<K, Holder<T[]>>, Map<K, T[]>>;
function groupingBy<T, K, A, R>(
  keyFn: Fn<T, K>,
  downstream: Collector<T, A, R>
): Collector<T, Map<K, Holder<A>>, Map<K, R>>;
function groupingBy<T, K, A, R>(
  keyFn: Fn<T, K>,
  downstream?: Collector<T, A, R>
): Collector<T, Map<K, Holder<A>>, Map<K, R>> | Collector<T, Map<K, Holder<T[]>>, Map<K, T[]>> {
  return downstream ? grouped(keyFn, downstream) : grouped(keyFn, toArray<T>());
}

function grouped<T, K, A, R>(
  keyFn: Fn<T, K>,
  downstream: Collector<T, A, R>
): Collector<T, Map<K, Holder<A>>, Map<K, R>> {
  return {
    supplier: () => new Map<K, Holder<A>>(),
    accumulator: (groups, item) => {
      const key = keyFn(item);
      let group = groups.get(key);
      if (!group) {
        group = { value: downstream.supplier() };
        groups.set(key, group);
      }
      downstream.accumulator(group.value, item);
    },
    finisher: (groups) => {
      const result = new Map<K, R>();
      for (const [key, group] of groups) {
        result.set(key, downstream.finisher(group.value));
      }
      return result;
    },
  };
}

function partitioningBy<T>(predicate: Predicate<T>): Collector<T, Partition<T>, Partition<T>> {
  return {
    supplier: () => ({ true: [], false: [] }),
    accumulator: (partition, item) => {
      (predicate(item) ? partition.true : partition.false).push(item);
    },
    finisher: (partition) => partition,
  };
}

/**
 * Build a Map from each element. Without `merge`, a repeated key throws
 * IllegalStateError.
 */
function toMap<T, K, V>(
  keyFn: Fn<T, K>,
  valueFn: Fn<T, V>,
  merge?: BinaryOperator<V>
): Collector<T, Map<K, Holder<V>>, Map<K, V>> {
  return {
    supplier: () => new Map<K, Holder<V>>(),
    accumulator: (entries, item) => {
      const key = keyFn(item);
      const value = valueFn(item);
      const existing = entries.get(key);
      if (!existing) {
        entries.set(key, { value });
      } else if (merge) {
        existing.value = merge(existing.value, value);
      } else {
        throw new IllegalStateError({ reason: `duplicate key ${String(key)}` });
      }
    },
    finisher: (entries) => {
      const result = new Map<K, V>();
      for (const [key, holder] of entries) {
        result.set(key, holder.value);
      }
      return result;
    },
  };
}

/**
 * Ready-made collectors.
 */
export const Collectors = {
  toArray,
  toFrozenArray,
  toSet,
  joining,
  counting,
  summing,
  averaging,
  groupingBy,
  partitioningBy,
  toMap,
} as const;
