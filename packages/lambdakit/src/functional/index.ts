/**
 * lambdakit/functional
 *
 * Functions as values: the single-operation function types (predicate,
 * consumer, supplier, transformer) and the combinators that compose them.
 */

// =============================================================================
// Function Types
// =============================================================================

/** One-argument transformation. */
export type Fn<A, B> = (a: A) => B;

/** Two-argument transformation. */
export type BiFn<A, B, C> = (a: A, b: B) => C;

/** Transformation whose input and output share a type. */
export type UnaryOperator<T> = Fn<T, T>;

/** Two-argument transformation over a single type. */
export type BinaryOperator<T> = BiFn<T, T, T>;

/** Condition test. */
export type Predicate<T> = (value: T) => boolean;

export type BiPredicate<A, B> = (a: A, b: B) => boolean;

/** Single-argument effect. */
export type Consumer<T> = (value: T) => void;

export type BiConsumer<A, B> = (a: A, b: B) => void;

/** Zero-argument producer. */
export type Supplier<T> = () => T;

/** Zero-argument effect. */
export type Runnable = () => void;

/**
 * Ordering function: negative when `a` sorts first, positive when `b` does,
 * zero when they tie.
 */
export type Comparator<T> = (a: T, b: T) => number;

// =============================================================================
// Composition
// =============================================================================

/**
 * Pipe a value through a series of functions left-to-right.
 *
 * @example
 * ```typescript
 * pipe(5, (x) => x * 2, (x) => x + 1); // 11
 * ```
 */
export function pipe<A>(a: A): A;
export function pipe<A, B>(a: A, ab: Fn<A, B>): B;
export function pipe<A, B, C>(a: A, ab: Fn<A, B>, bc: Fn<B, C>): C;
export function pipe<A, B, C, D>(a: A, ab: Fn<A, B>, bc: Fn<B, C>, cd: Fn<C, D>): D;
export function pipe<A, B, C, D, E>(a: A, ab: Fn<A, B>, bc: Fn<B, C>, cd: Fn<C, D>, de: Fn<D, E>): E;
export function pipe<A, B, C, D, E, F>(
  a: A,
  ab: Fn<A, B>,
  bc: Fn<B, C>,
  cd: Fn<C, D>,
  de: Fn<D, E>,
  ef: Fn<E, F>
): F;
export function pipe<A, B, C, D, E, F, G>(
  a: A,
  ab: Fn<A, B>,
  bc: Fn<B, C>,
  cd: Fn<C, D>,
  de: Fn<D, E>,
  ef: Fn<E, F>,
  fg: Fn<F, G>
): G;
export function pipe(a: unknown, ...fns: Array<Fn<never, unknown>>): unknown {
  return fns.reduce<unknown>((acc, fn) => callUnchecked(fn, acc), a);
}

/**
 * Compose functions left-to-right (returns a function).
 *
 * @example
 * ```typescript
 * const transform = flow((x: number) => x * 2, (x) => x + 1);
 * transform(5); // 11
 * ```
 */
export function flow<A, B>(ab: Fn<A, B>): Fn<A, B>;
export function flow<A, B, C>(ab: Fn<A, B>, bc: Fn<B, C>): Fn<A, C>;
export function flow<A, B, C, D>(ab: Fn<A, B>, bc: Fn<B, C>, cd: Fn<C, D>): Fn<A, D>;
export function flow<A, B, C, D, E>(ab: Fn<A, B>, bc: Fn<B, C>, cd: Fn<C, D>, de: Fn<D, E>): Fn<A, E>;
export function flow<A, B, C, D, E, F>(
  ab: Fn<A, B>,
  bc: Fn<B, C>,
  cd: Fn<C, D>,
  de: Fn<D, E>,
  ef: Fn<E, F>
): Fn<A, F>;
export function flow(...fns: Array<Fn<never, unknown>>): Fn<unknown, unknown> {
  return (a: unknown) => fns.reduce<unknown>((acc, fn) => callUnchecked(fn, acc), a);
}

/**
 * Compose functions right-to-left.
 *
 * @example
 * ```typescript
 * const transform = compose((x: number) => x + 1, (x: number) => x * 2);
 * transform(5); // 11 (double first, then addOne)
 * ```
 */
export function compose<A, B>(ab: Fn<A, B>): Fn<A, B>;
export function compose<A, B, C>(bc: Fn<B, C>, ab: Fn<A, B>): Fn<A, C>;
export function compose<A, B, C, D>(cd: Fn<C, D>, bc: Fn<B, C>, ab: Fn<A, B>): Fn<A, D>;
export function compose<A, B, C, D, E>(de: Fn<D, E>, cd: Fn<C, D>, bc: Fn<B, C>, ab: Fn<A, B>): Fn<A, E>;
export function compose(...fns: Array<Fn<never, unknown>>): Fn<unknown, unknown> {
  return (a: unknown) => fns.reduceRight<unknown>((acc, fn) => callUnchecked(fn, acc), a);
}

// The overloads above check that each step accepts the previous one's output.
function callUnchecked(fn: Fn<never, unknown>, value: unknown): unknown {
  return (fn as Fn<unknown, unknown>)(value);
}

/**
 * Apply `f`, then `g` to its result.
 *
 * @example
 * ```typescript
 * const square = (x: number) => x * x;
 * const double = (x: number) => x * 2;
 * andThen(square, double)(5); // 50
 * ```
 */
export const andThen =
  <A, B, C>(f: Fn<A, B>, g: Fn<B, C>): Fn<A, C> =>
  (a) =>
    g(f(a));

/**
 * Apply `g` first, then `f` to its result.
 *
 * @example
 * ```typescript
 * composeWith(square, double)(5); // 100
 * ```
 */
export const composeWith =
  <A, B, C>(f: Fn<B, C>, g: Fn<A, B>): Fn<A, C> =>
  (a) =>
    f(g(a));

/**
 * Identity function - returns its argument unchanged.
 */
export const identity = <A>(a: A): A => a;

/**
 * Function that ignores its input and always returns `value`.
 */
export const constant =
  <T>(value: T): Supplier<T> =>
  () =>
    value;

/**
 * Turn a two-argument function into a chain of one-argument functions.
 *
 * @example
 * ```typescript
 * const add = curry((a: number, b: number) => a + b);
 * add(2)(3); // 5
 * ```
 */
export const curry =
  <A, B, C>(fn: BiFn<A, B, C>): Fn<A, Fn<B, C>> =>
  (a) =>
  (b) =>
    fn(a, b);

/**
 * Inverse of curry.
 */
export const uncurry =
  <A, B, C>(fn: Fn<A, Fn<B, C>>): BiFn<A, B, C> =>
  (a, b) =>
    fn(a)(b);

// =============================================================================
// Predicates
// =============================================================================

/**
 * Predicate that holds when every given predicate holds. Stops at the first
 * failure.
 *
 * @example
 * ```typescript
 * const isLong = (s: string) => s.length > 5;
 * const startsWithF = (s: string) => /^f/i.test(s);
 * and(isLong, startsWithF)('functional'); // true
 * ```
 */
export const and =
  <T>(...predicates: Predicate<T>[]): Predicate<T> =>
  (value) =>
    predicates.every((p) => p(value));

/**
 * Predicate that holds when any given predicate holds. Stops at the first
 * success.
 */
export const or =
  <T>(...predicates: Predicate<T>[]): Predicate<T> =>
  (value) =>
    predicates.some((p) => p(value));

export const negate =
  <T>(predicate: Predicate<T>): Predicate<T> =>
  (value) =>
    !predicate(value);

/** Alias of negate, reads better inline: `filter(not(isEmpty))`. */
export const not = negate;

/**
 * Predicate testing SameValueZero equality with `target` (NaN equals NaN).
 */
export const isEqual =
  <T>(target: T): Predicate<T> =>
  (value) =>
    value === target || (Number.isNaN(value) && Number.isNaN(target));

export const alwaysTrue: Predicate<unknown> = () => true;

export const alwaysFalse: Predicate<unknown> = () => false;

// =============================================================================
// Consumers and Suppliers
// =============================================================================

/**
 * Consumer that runs `first`, then `second`, with the same value.
 */
export const andThenConsumer =
  <T>(first: Consumer<T>, second: Consumer<T>): Consumer<T> =>
  (value) => {
    first(value);
    second(value);
  };

/**
 * A supplier that computes its value on the first call and returns the same
 * value afterwards. `isEvaluated()` reports whether the first call happened.
 *
 * @example
 * ```typescript
 * const config = memoize(() => loadConfig());
 * config.isEvaluated(); // false
 * config.get();         // loads
 * config.get();         // cached
 * ```
 */
export interface Memoized<T> {
  get(): T;
  isEvaluated(): boolean;
}

export function memoize<T>(supplier: Supplier<T>): Memoized<T> {
  let state: { evaluated: false } | { evaluated: true; value: T } = { evaluated: false };
  return {
    get() {
      if (!state.evaluated) {
        state = { evaluated: true, value: supplier() };
      }
      return state.value;
    },
    isEvaluated: () => state.evaluated,
  };
}

// =============================================================================
// Binary Operators
// =============================================================================

/**
 * Binary operator returning the lesser of two values; ties keep the first.
 */
export const minBy =
  <T>(comparator: Comparator<T>): BinaryOperator<T> =>
  (a, b) =>
    comparator(a, b) <= 0 ? a : b;

/**
 * Binary operator returning the greater of two values; ties keep the first.
 */
export const maxBy =
  <T>(comparator: Comparator<T>): BinaryOperator<T> =>
  (a, b) =>
    comparator(a, b) >= 0 ? a : b;

export {
  naturalOrder,
  reverseOrder,
  comparing,
  thenComparing,
  reversed,
  equalsIgnoreCase,
} from "./comparator";
