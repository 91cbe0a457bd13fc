/**
 * lambdakit/seq - Stage Transformers
 *
 * Generator functions that wrap an upstream iterable. Each pulls from its
 * source only when its own consumer pulls, so a chain of them does no work
 * until a terminal operation asks for the first element.
 */

import type { Comparator, Consumer, Fn } from "../functional";
import { IllegalArgumentError } from "../errors";
import type { FilterFn, TransformFn } from "./types";

// =============================================================================
// map - Transform each item
// =============================================================================

/**
 * Transform each item.
 *
 * @example
 * ```typescript
 * [...map([1, 2, 3], (n) => n * 2)]; // [2, 4, 6]
 * ```
 */
export function* map<T, U>(source: Iterable<T>, fn: TransformFn<T, U>): Generator<U, void, undefined> {
  let index = 0;
  for (const item of source) {
    yield fn(item, index++);
  }
}

// =============================================================================
// filter - Keep items matching predicate
// =============================================================================

export function* filter<T>(source: Iterable<T>, predicate: FilterFn<T>): Generator<T, void, undefined> {
  let index = 0;
  for (const item of source) {
    if (predicate(item, index++)) {
      yield item;
    }
  }
}

// =============================================================================
// flatMap - Transform and flatten
// =============================================================================

/**
 * Transform each item to an iterable and flatten one level.
 *
 * @example
 * ```typescript
 * [...flatMap(['a b', 'c'], (line) => line.split(' '))]; // ['a', 'b', 'c']
 * ```
 */
export function* flatMap<T, U>(
  source: Iterable<T>,
  fn: TransformFn<T, Iterable<U>>
): Generator<U, void, undefined> {
  let index = 0;
  for (const item of source) {
    yield* fn(item, index++);
  }
}

// =============================================================================
// peek - Observe items as they pass
// =============================================================================

export function* peek<T>(source: Iterable<T>, consumer: Consumer<T>): Generator<T, void, undefined> {
  for (const item of source) {
    consumer(item);
    yield item;
  }
}

// =============================================================================
// limit / skip
// =============================================================================

/**
 * Take the first `maxSize` items. Returns as soon as the last one is
 * yielded, so the item after it is never pulled.
 */
export function* limit<T>(source: Iterable<T>, maxSize: number): Generator<T, void, undefined> {
  requireCount("maxSize", maxSize);
  if (maxSize === 0) return;

  let taken = 0;
  for (const item of source) {
    yield item;
    taken++;
    if (taken >= maxSize) return;
  }
}

export function* skip<T>(source: Iterable<T>, count: number): Generator<T, void, undefined> {
  requireCount("count", count);
  let skipped = 0;
  for (const item of source) {
    if (skipped < count) {
      skipped++;
      continue;
    }
    yield item;
  }
}

/**
 * Stage arguments are validated when the stage is built, not on first pull.
 */
export function requireCount(argument: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new IllegalArgumentError({ argument, reason: "must be a non-negative integer", value });
  }
}

// =============================================================================
// takeWhile / dropWhile
// =============================================================================

/**
 * Take items while the predicate holds; stop at the first that fails.
 */
export function* takeWhile<T>(source: Iterable<T>, predicate: FilterFn<T>): Generator<T, void, undefined> {
  let index = 0;
  for (const item of source) {
    if (!predicate(item, index++)) return;
    yield item;
  }
}

/**
 * Drop items while the predicate holds, then yield the rest unchanged.
 */
export function* dropWhile<T>(source: Iterable<T>, predicate: FilterFn<T>): Generator<T, void, undefined> {
  let dropping = true;
  let index = 0;
  for (const item of source) {
    if (dropping && predicate(item, index++)) continue;
    dropping = false;
    yield item;
  }
}

// =============================================================================
// distinct / distinctBy
// =============================================================================

/**
 * Drop repeats, keeping first occurrences in order. Equality is
 * SameValueZero, the same as Set membership.
 */
export function* distinct<T>(source: Iterable<T>): Generator<T, void, undefined> {
  yield* distinctBy(source, (item) => item);
}

export function* distinctBy<T, K>(source: Iterable<T>, keyFn: Fn<T, K>): Generator<T, void, undefined> {
  const seen = new Set<K>();
  for (const item of source) {
    const key = keyFn(item);
    if (!seen.has(key)) {
      seen.add(key);
      yield item;
    }
  }
}

// =============================================================================
// sorted - Buffer and sort
// =============================================================================

/**
 * Sort the whole upstream. Nothing is pulled until the first item is
 * requested; then everything is. The sort is stable.
 */
export function* sorted<T>(source: Iterable<T>, comparator: Comparator<T>): Generator<T, void, undefined> {
  const buffer = Array.from(source);
  buffer.sort(comparator);
  yield* buffer;
}

// =============================================================================
// chunk - Group items into fixed-size batches
// =============================================================================

/**
 * Group items into arrays of `size`; the last may be shorter.
 */
export function* chunk<T>(source: Iterable<T>, size: number): Generator<T[], void, undefined> {
  requireChunkSize(size);

  let currentChunk: T[] = [];
  for (const item of source) {
    currentChunk.push(item);
    if (currentChunk.length >= size) {
      yield currentChunk;
      currentChunk = [];
    }
  }

  if (currentChunk.length > 0) {
    yield currentChunk;
  }
}

export function requireChunkSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new IllegalArgumentError({ argument: "size", reason: "must be a positive integer", value: size });
  }
}

// =============================================================================
// zip / concat
// =============================================================================

/**
 * Pair items position by position; ends with the shorter side. The right
 * side is pulled first, so a longer left side is never pulled past the
 * last pair.
 */
export function* zip<T, U>(left: Iterable<T>, right: Iterable<U>): Generator<[T, U], void, undefined> {
  const leftIterator = left[Symbol.iterator]();
  const rightIterator = right[Symbol.iterator]();
  try {
    while (true) {
      const nextRight = rightIterator.next();
      if (nextRight.done) return;
      const nextLeft = leftIterator.next();
      if (nextLeft.done) return;
      yield [nextLeft.value, nextRight.value];
    }
  } finally {
    leftIterator.return?.();
    rightIterator.return?.();
  }
}

export function* concat<T>(first: Iterable<T>, second: Iterable<T>): Generator<T, void, undefined> {
  yield* first;
  yield* second;
}
