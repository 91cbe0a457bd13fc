/**
 * lambdakit/seq - Seq
 *
 * A lazy, pull-based pipeline over a possibly infinite sequence.
 *
 * A Seq holds a source factory, not an iterator: every terminal operation
 * calls the factory again, so the same Seq can be traversed any number of
 * times. Intermediate operations wrap the factory in another generator stage
 * and return a new Seq; nothing is produced until a terminal operation pulls.
 *
 * @example
 * ```typescript
 * import { Seq } from 'lambdakit/seq';
 *
 * const evens = Seq.iterate(0, (n) => n + 1).filter((n) => n % 2 === 0);
 * evens.limit(3).toArray(); // [0, 2, 4]
 * evens.toArray(); // throws UnboundedSequenceError
 * ```
 */

import type { BiFn, BinaryOperator, Comparator, Consumer, Fn, Predicate, Supplier, UnaryOperator } from "../functional";
import { minBy, maxBy } from "../functional";
import type { Option } from "../option";
import { of as optionOf, empty as optionEmpty } from "../option";
import { IllegalStateError, UnboundedSequenceError } from "../errors";
import type { Collector } from "./collectors";
import type { ExhaustiveOperation, FilterFn, SeqOptions, TerminalOperation, TransformFn } from "./types";
import { DEFAULT_SEQ_OPTIONS } from "./types";
import {
  rangeIterable,
  requireRange,
  iterateIterable,
  iterateWhileIterable,
  generateIterable,
  repeatIterable,
  splitIterable,
} from "./sources";
import * as stages from "./transformers";

// =============================================================================
// Internal Types
// =============================================================================

/** State of one traversal, shared by every stage of the chain. */
interface Traversal {
  /** Elements taken from the root source so far */
  pulled: number;
  /** Options of the Seq the traversal was started from */
  readonly options: Readonly<SeqOptions>;
}

type SourceFactory<T> = (traversal: Traversal) => Iterable<T>;

interface SeqMeta {
  /** False when the sequence may never end */
  readonly bounded: boolean;
  readonly options: Readonly<SeqOptions>;
}

function* counted<T>(source: Iterable<T>, traversal: Traversal): Generator<T, void, undefined> {
  for (const item of source) {
    traversal.pulled++;
    yield item;
  }
}

// =============================================================================
// Seq
// =============================================================================

export class Seq<T> implements Iterable<T> {
  private constructor(
    private readonly source: SourceFactory<T>,
    private readonly meta: SeqMeta
  ) {}

  private static root<T>(source: Supplier<Iterable<T>>, bounded: boolean): Seq<T> {
    return new Seq((traversal) => counted(source(), traversal), { bounded, options: DEFAULT_SEQ_OPTIONS });
  }

  // ===========================================================================
  // Sources
  // ===========================================================================

  static empty<T = never>(): Seq<T> {
    return Seq.root<T>(() => [], true);
  }

  static of<T>(...items: T[]): Seq<T> {
    return Seq.root(() => items, true);
  }

  /**
   * Wrap an iterable. It is iterated afresh on every traversal, so pass a
   * re-iterable collection; use `fromIterator` for a one-shot source.
   */
  static from<T>(iterable: Iterable<T>): Seq<T> {
    if (iterable instanceof Seq) {
      return iterable;
    }
    return Seq.root(() => iterable, true);
  }

  /**
   * Wrap an iterator that can only be walked once. A second traversal
   * throws IllegalStateError.
   */
  static fromIterator<T>(iterator: Iterator<T>): Seq<T> {
    let consumed = false;
    return Seq.root(() => {
      if (consumed) {
        throw new IllegalStateError({ reason: "sequence has already been consumed" });
      }
      consumed = true;
      return { [Symbol.iterator]: () => iterator };
    }, true);
  }

  /**
   * Integers from `start` up to, not including, `endExclusive`. A negative
   * step counts down.
   *
   * @throws IllegalArgumentError when an argument is not a safe integer or `step` is zero
   */
  static range(start: number, endExclusive: number, step = 1): Seq<number> {
    requireRange(start, endExclusive, step, "endExclusive");
    return Seq.root(() => rangeIterable(start, endExclusive, step, false), true);
  }

  /**
   * Integers from `start` through `endInclusive`.
   *
   * @throws IllegalArgumentError when either bound is not a safe integer
   */
  static rangeClosed(start: number, endInclusive: number): Seq<number> {
    requireRange(start, endInclusive, 1, "endInclusive");
    return Seq.root(() => rangeIterable(start, endInclusive, 1, true), true);
  }

  /**
   * `seed, next(seed), next(next(seed)), ...`. With `hasNext`, the sequence
   * ends before the first element that fails it; without, it never ends.
   *
   * @example
   * ```typescript
   * Seq.iterate(1, (n) => n * 2).limit(5).toArray(); // [1, 2, 4, 8, 16]
   * Seq.iterate(1, (n) => n < 20, (n) => n * 2).toArray(); // [1, 2, 4, 8, 16]
   * ```
   */
  static iterate<T>(seed: T, next: UnaryOperator<T>): Seq<T>;
  static iterate<T>(seed: T, hasNext: Predicate<T>, next: UnaryOperator<T>): Seq<T>;
  static iterate<T>(seed: T, ...args: [UnaryOperator<T>] | [Predicate<T>, UnaryOperator<T>]): Seq<T> {
    if (args.length === 1) {
      const [next] = args;
      return Seq.root(() => iterateIterable(seed, next), false);
    }
    const [hasNext, next] = args;
    return Seq.root(() => iterateWhileIterable(seed, hasNext, next), true);
  }

  /** Endless sequence of `supplier()` results, called once per pulled element. */
  static generate<T>(supplier: Supplier<T>): Seq<T> {
    return Seq.root(() => generateIterable(supplier), false);
  }

  static repeat<T>(value: T): Seq<T> {
    return Seq.root(() => repeatIterable(value), false);
  }

  /**
   * Pieces of `text` between separators. Trailing empty pieces are dropped.
   *
   * @example
   * ```typescript
   * Seq.split('red green  blue', /\s+/).toArray(); // ['red', 'green', 'blue']
   * ```
   */
  static split(text: string, separator: string | RegExp): Seq<string> {
    return Seq.root(() => splitIterable(text, separator), true);
  }

  /**
   * Elements of `first`, then elements of `second`. Bounded only when both are.
   */
  static concat<T>(first: Seq<T>, second: Seq<T>): Seq<T> {
    return first.concat(second);
  }

  /** Zero or one element. */
  static ofOption<T>(option: Option<T>): Seq<T> {
    return Seq.root(() => (option.present ? [option.value] : []), true);
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /**
   * Attach options. They are merged over the current ones and carried by
   * every stage built from the returned Seq.
   *
   * @example
   * ```typescript
   * Seq.repeat('x')
   *   .withOptions({ unboundedPolicy: 'ignore', onEvent: (e) => console.log(e.type) })
   *   .anyMatch((s) => s === 'x');
   * ```
   */
  withOptions(options: Partial<SeqOptions>): Seq<T> {
    return new Seq(this.source, { bounded: this.meta.bounded, options: { ...this.meta.options, ...options } });
  }

  /** Whether the sequence is known to end. */
  get bounded(): boolean {
    return this.meta.bounded;
  }

  // ===========================================================================
  // Intermediate Operations
  // ===========================================================================

  private pipe<U>(
    stage: (source: Iterable<T>, traversal: Traversal) => Iterable<U>,
    bounded = this.meta.bounded
  ): Seq<U> {
    const upstream = this.source;
    return new Seq<U>((traversal) => stage(upstream(traversal), traversal), {
      bounded,
      options: this.meta.options,
    });
  }

  map<U>(fn: TransformFn<T, U>): Seq<U> {
    return this.pipe((source) => stages.map(source, fn));
  }

  filter<S extends T>(predicate: (item: T, index: number) => item is S): Seq<S>;
  filter(predicate: FilterFn<T>): Seq<T>;
  filter(predicate: FilterFn<T>): Seq<T> {
    return this.pipe((source) => stages.filter(source, predicate));
  }

  /**
   * Replace each element with the elements of the iterable `fn` returns.
   *
   * @example
   * ```typescript
   * Seq.of([1, 2], [3], []).flatMap((xs) => xs).toArray(); // [1, 2, 3]
   * ```
   */
  flatMap<U>(fn: TransformFn<T, Iterable<U>>): Seq<U> {
    return this.pipe((source) => stages.flatMap(source, fn));
  }

  /** Run `consumer` on each element as it passes. */
  peek(consumer: Consumer<T>): Seq<T> {
    return this.pipe((source) => stages.peek(source, consumer));
  }

  /**
   * First `maxSize` elements. The element after the last one is never pulled.
   *
   * @throws IllegalArgumentError when `maxSize` is negative
   */
  limit(maxSize: number): Seq<T> {
    stages.requireCount("maxSize", maxSize);
    return this.pipe((source) => stages.limit(source, maxSize), true);
  }

  /**
   * @throws IllegalArgumentError when `count` is negative
   */
  skip(count: number): Seq<T> {
    stages.requireCount("count", count);
    return this.pipe((source) => stages.skip(source, count));
  }

  takeWhile(predicate: FilterFn<T>): Seq<T> {
    return this.pipe((source) => stages.takeWhile(source, predicate), true);
  }

  dropWhile(predicate: FilterFn<T>): Seq<T> {
    return this.pipe((source) => stages.dropWhile(source, predicate));
  }

  /** Drop repeated elements (SameValueZero), keeping first occurrences. */
  distinct(): Seq<T> {
    return this.pipe((source) => stages.distinct(source));
  }

  distinctBy<K>(keyFn: Fn<T, K>): Seq<T> {
    return this.pipe((source) => stages.distinctBy(source, keyFn));
  }

  /**
   * Sort with `comparator`. The whole upstream is buffered on the first
   * pull; on an unbounded sequence the unbounded policy applies first.
   */
  sorted(comparator: Comparator<T>): Seq<T> {
    const bounded = this.meta.bounded;
    return this.pipe((source, traversal) => {
      if (!bounded) {
        applyUnboundedPolicy("sorted", traversal.options);
      }
      return stages.sorted(source, comparator);
    });
  }

  /**
   * Group elements into arrays of `size`; the last may be shorter.
   *
   * @throws IllegalArgumentError when `size` is less than 1
   */
  chunk(size: number): Seq<T[]> {
    stages.requireChunkSize(size);
    return this.pipe((source) => stages.chunk(source, size));
  }

  /**
   * Pair elements position by position, ending with the shorter side.
   * Bounded when either side is.
   */
  zip<U>(other: Iterable<U>): Seq<[T, U]> {
    const right = Seq.from(other);
    const left = this.source;
    return new Seq<[T, U]>((traversal) => stages.zip(left(traversal), right.source(traversal)), {
      bounded: this.meta.bounded || right.meta.bounded,
      options: this.meta.options,
    });
  }

  /** Elements of this Seq, then elements of `other`. */
  concat(other: Iterable<T>): Seq<T> {
    const second = Seq.from(other);
    const first = this.source;
    return new Seq<T>((traversal) => stages.concat(first(traversal), second.source(traversal)), {
      bounded: this.meta.bounded && second.meta.bounded,
      options: this.meta.options,
    });
  }

  // ===========================================================================
  // Terminal Operations
  // ===========================================================================

  [Symbol.iterator](): Iterator<T> {
    return this.source({ pulled: 0, options: this.meta.options })[Symbol.iterator]();
  }

  toArray(): T[] {
    return this.run("toArray", (items) => Array.from(items));
  }

  /**
   * Reduce with a Collector.
   *
   * @example
   * ```typescript
   * Seq.of('a', 'bb', 'cc').collect(Collectors.groupingBy((s) => s.length));
   * // Map { 1 => ['a'], 2 => ['bb', 'cc'] }
   * ```
   */
  collect<A, R>(collector: Collector<T, A, R>): R {
    return this.run("collect", (items) => {
      const container = collector.supplier();
      for (const item of items) {
        collector.accumulator(container, item);
      }
      return collector.finisher(container);
    });
  }

  forEach(consumer: Consumer<T>): void {
    this.run("forEach", (items) => {
      for (const item of items) {
        consumer(item);
      }
    });
  }

  count(): number {
    return this.run("count", (items) => {
      let n = 0;
      for (const _ of items) n++;
      return n;
    });
  }

  /**
   * Fold the elements. Without an identity the result is an Option, empty
   * for an empty sequence.
   *
   * @example
   * ```typescript
   * Seq.rangeClosed(1, 5).reduce(0, (a, b) => a + b); // 15
   * Seq.of<number>().reduce((a, b) => a + b); // Option.empty
   * ```
   */
  reduce(op: BinaryOperator<T>): Option<T>;
  reduce<U>(identity: U, op: BiFn<U, T, U>): U;
  reduce<U>(...args: [BinaryOperator<T>] | [U, BiFn<U, T, U>]): Option<T> | U {
    return this.run("reduce", (items) => {
      if (args.length === 2) {
        const [identity, op] = args;
        let acc = identity;
        for (const item of items) acc = op(acc, item);
        return acc;
      }
      return foldFirst(items, args[0]);
    });
  }

  min(comparator: Comparator<T>): Option<T> {
    return this.run("min", (items) => foldFirst(items, minBy(comparator)));
  }

  max(comparator: Comparator<T>): Option<T> {
    return this.run("max", (items) => foldFirst(items, maxBy(comparator)));
  }

  /**
   * Join the elements' string forms.
   */
  join(separator = ","): string {
    return this.run("join", (items) => Array.from(items, (item) => String(item)).join(separator));
  }

  /**
   * The first element, pulling nothing past it.
   *
   * @throws NullReferenceError when the first element is null or undefined
   */
  findFirst(): Option<T> {
    return this.run("findFirst", (items) => {
      for (const item of items) {
        return optionOf(item);
      }
      return optionEmpty<T>();
    });
  }

  anyMatch(predicate: Predicate<T>): boolean {
    return this.run("anyMatch", (items) => {
      for (const item of items) {
        if (predicate(item)) return true;
      }
      return false;
    });
  }

  allMatch(predicate: Predicate<T>): boolean {
    return this.run("allMatch", (items) => {
      for (const item of items) {
        if (!predicate(item)) return false;
      }
      return true;
    });
  }

  noneMatch(predicate: Predicate<T>): boolean {
    return this.run("noneMatch", (items) => {
      for (const item of items) {
        if (predicate(item)) return false;
      }
      return true;
    });
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  private run<R>(operation: TerminalOperation, body: Fn<Iterable<T>, R>): R {
    const { options } = this.meta;
    const traversal: Traversal = { pulled: 0, options };
    const startTime = performance.now();
    options.onEvent?.({ type: "seq_terminal_start", operation });

    try {
      if (!this.meta.bounded && isExhaustive(operation)) {
        applyUnboundedPolicy(operation, options);
      }
      const result = body(this.source(traversal));
      options.onEvent?.({
        type: "seq_terminal_complete",
        operation,
        pulled: traversal.pulled,
        durationMs: performance.now() - startTime,
      });
      return result;
    } catch (error) {
      options.onEvent?.({ type: "seq_terminal_error", operation, pulled: traversal.pulled, error });
      throw error;
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

const EXHAUSTIVE_OPERATIONS: ReadonlySet<TerminalOperation> = new Set<ExhaustiveOperation>([
  "toArray",
  "collect",
  "forEach",
  "count",
  "reduce",
  "min",
  "max",
  "join",
  "sorted",
]);

function applyUnboundedPolicy(operation: ExhaustiveOperation, options: Readonly<SeqOptions>): void {
  const policy = options.unboundedPolicy;
  if (policy === "throw") {
    throw new UnboundedSequenceError({ operation });
  }
  if (policy === "warn" && process.env.NODE_ENV !== "production") {
    console.warn(
      `lambdakit: Seq.${operation}() called on an unbounded sequence.\n\n` +
        `  This only returns if the sequence ends on its own.\n` +
        `  Add limit() or takeWhile() before ${operation}(), or set unboundedPolicy: 'ignore'.`
    );
  }
  options.onEvent?.({ type: "seq_unbounded", operation, policy });
}

function isExhaustive(operation: TerminalOperation): operation is ExhaustiveOperation {
  return EXHAUSTIVE_OPERATIONS.has(operation);
}

/**
 * Fold without an identity; the first element seeds the accumulator.
 *
 * @throws NullReferenceError when the result is null or undefined
 */
function foldFirst<T>(items: Iterable<T>, op: BinaryOperator<T>): Option<T> {
  let state: { seeded: false } | { seeded: true; acc: T } = { seeded: false };
  for (const item of items) {
    state = state.seeded ? { seeded: true, acc: op(state.acc, item) } : { seeded: true, acc: item };
  }
  return state.seeded ? optionOf(state.acc) : optionEmpty<T>();
}
