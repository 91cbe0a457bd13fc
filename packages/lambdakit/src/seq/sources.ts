/**
 * lambdakit/seq - Source Iterables
 *
 * Generators behind the Seq factory methods. Infinite ones compute each
 * element only when it is pulled.
 */

import type { Predicate, Supplier, UnaryOperator } from "../functional";
import { IllegalArgumentError } from "../errors";

/**
 * Integers from `start` toward `end` by `step`. `end` itself is included
 * only when `inclusive` is set.
 */
export function* rangeIterable(
  start: number,
  end: number,
  step: number,
  inclusive: boolean
): Generator<number, void, undefined> {
  if (step > 0) {
    for (let i = start; inclusive ? i <= end : i < end; i += step) yield i;
  } else {
    for (let i = start; inclusive ? i >= end : i > end; i += step) yield i;
  }
}

/**
 * Range bounds and step must be safe integers, so that every `i += step`
 * moves past the previous element; the step must not be zero.
 */
export function requireRange(start: number, end: number, step: number, endArgument: string): void {
  for (const [argument, value] of [
    ["start", start],
    [endArgument, end],
    ["step", step],
  ] as const) {
    if (!Number.isSafeInteger(value)) {
      throw new IllegalArgumentError({ argument, reason: "must be a safe integer", value });
    }
  }
  if (step === 0) {
    throw new IllegalArgumentError({ argument: "step", reason: "must not be zero", value: step });
  }
}

/**
 * `seed`, `next(seed)`, `next(next(seed))`, ... The next element is computed
 * when it is pulled, not when the previous one is yielded.
 */
export function* iterateIterable<T>(seed: T, next: UnaryOperator<T>): Generator<T, never, undefined> {
  let current = seed;
  while (true) {
    yield current;
    current = next(current);
  }
}

/**
 * Like iterateIterable, ending before the first element that fails `hasNext`.
 */
export function* iterateWhileIterable<T>(
  seed: T,
  hasNext: Predicate<T>,
  next: UnaryOperator<T>
): Generator<T, void, undefined> {
  for (let current = seed; hasNext(current); current = next(current)) {
    yield current;
  }
}

export function* generateIterable<T>(supplier: Supplier<T>): Generator<T, never, undefined> {
  while (true) yield supplier();
}

export function* repeatIterable<T>(value: T): Generator<T, never, undefined> {
  while (true) yield value;
}

/**
 * Pieces of `text` between matches of `separator`. Trailing empty pieces
 * are dropped; a text with no match gives the text itself.
 */
export function* splitIterable(text: string, separator: string | RegExp): Generator<string, void, undefined> {
  const parts = text.split(separator);
  let end = parts.length;
  while (end > 1 && parts[end - 1] === "") {
    end--;
  }
  for (let i = 0; i < end; i++) {
    yield parts[i];
  }
}
