/**
 * lambdakit/option
 *
 * A box holding zero or one value, used in place of a nullable reference.
 * Options are frozen plain objects; every operation is a data-first function,
 * with curried twins under `O` for use in pipe().
 *
 * @example
 * ```typescript
 * import { pipe } from 'lambdakit/functional';
 * import { ofNullable, O } from 'lambdakit/option';
 *
 * const city = pipe(
 *   ofNullable(user.address),
 *   O.map((address) => address.city),
 *   O.filter((name) => name.startsWith('New')),
 *   O.orElse('unknown')
 * );
 * ```
 */

import { NoSuchElementError, NullReferenceError } from "../errors";
import type { Consumer, Predicate, Runnable, Supplier } from "../functional";
import type { Result } from "../result";
import { ok, err } from "../result";

// =============================================================================
// Types
// =============================================================================

/**
 * An Option holding a value.
 */
export interface Some<T> {
  readonly present: true;
  readonly value: T;
}

/**
 * The empty Option.
 */
export interface None {
  readonly present: false;
}

/**
 * A value that may be absent.
 */
export type Option<T> = Some<T> | None;

export interface OptionMatchers<T, R> {
  some: (value: T) => R;
  none: () => R;
}

// =============================================================================
// Constructors
// =============================================================================

const NONE: None = Object.freeze({ present: false });

function some<T>(value: T): Some<T> {
  const option: Some<T> = { present: true, value };
  return Object.freeze(option);
}

/**
 * Wrap a value that must exist.
 *
 * @throws NullReferenceError when `value` is null or undefined
 */
export function of<T>(value: T): Option<NonNullable<T>> {
  if (value === null || value === undefined) {
    throw new NullReferenceError({ reference: "Option.of() value" });
  }
  warnIfNested(value, "of");
  return some(value);
}

/**
 * Wrap a value that may be null or undefined; either gives the empty Option.
 */
export function ofNullable<T>(value: T | null | undefined): Option<T> {
  if (value === null || value === undefined) {
    return NONE;
  }
  warnIfNested(value, "ofNullable");
  return some(value);
}

/**
 * The empty Option.
 */
export const empty = <T = never>(): Option<T> => NONE;

/**
 * Check whether a value is an Option produced by this module.
 */
export function isOption(value: unknown): value is Option<unknown> {
  if (typeof value !== "object" || value === null || !Object.isFrozen(value)) {
    return false;
  }
  const keys = Object.keys(value);
  if (!("present" in value)) return false;
  return value.present === true
    ? keys.length === 2 && "value" in value
    : value.present === false && keys.length === 1;
}

function warnIfNested(value: unknown, operation: string): void {
  if (process.env.NODE_ENV !== "production" && isOption(value)) {
    console.warn(
      `lambdakit: Option.${operation}() received a value that is already an Option.\n\n` +
        `  Incorrect: ofNullable(findUser(id))   // Option<Option<User>>\n` +
        `  Correct:   findUser(id)               // Option<User>\n\n` +
        `Use flatMap() instead of map() when the mapper returns an Option.`
    );
  }
}

// =============================================================================
// Queries
// =============================================================================

export const isPresent = <T>(option: Option<T>): option is Some<T> => option.present;

export const isEmpty = <T>(option: Option<T>): option is None => !option.present;

/**
 * Read the value.
 *
 * @throws NoSuchElementError when the Option is empty
 */
export function get<T>(option: Option<T>): T {
  if (!option.present) {
    throw new NoSuchElementError({});
  }
  return option.value;
}

// =============================================================================
// Combinators
// =============================================================================

/**
 * Transform the value when present. A null or undefined result gives the
 * empty Option.
 *
 * @example
 * ```typescript
 * map(of('New York'), (c) => c.length); // Some(8)
 * map(empty<string>(), (c) => c.length); // None
 * ```
 */
export function map<T, U>(option: Option<T>, fn: (value: T) => U | null | undefined): Option<U> {
  return option.present ? ofNullable(fn(option.value)) : NONE;
}

/**
 * Transform the value with a function that itself returns an Option. The
 * returned Option is passed through as is.
 *
 * @example
 * ```typescript
 * const capitalOf = (country: string) => ofNullable(capitals.get(country));
 * flatMap(of('Spain'), capitalOf); // Some('Madrid')
 * ```
 */
export function flatMap<T, U>(option: Option<T>, fn: (value: T) => Option<U>): Option<U> {
  return option.present ? fn(option.value) : NONE;
}

/**
 * Keep the value only if it satisfies the predicate.
 */
export function filter<T, S extends T>(option: Option<T>, predicate: (value: T) => value is S): Option<S>;
export function filter<T>(option: Option<T>, predicate: Predicate<T>): Option<T>;
export function filter<T>(option: Option<T>, predicate: Predicate<T>): Option<T> {
  return option.present && predicate(option.value) ? option : NONE;
}

/**
 * Use an alternative source when empty. The supplier is not called when a
 * value is present.
 */
export function or<T>(option: Option<T>, supplier: Supplier<Option<T>>): Option<T> {
  return option.present ? option : supplier();
}

/**
 * Run one of two functions depending on presence.
 */
export function match<T, R>(option: Option<T>, matchers: OptionMatchers<T, R>): R {
  return option.present ? matchers.some(option.value) : matchers.none();
}

/**
 * Combine two Options; present only when both are.
 *
 * @example
 * ```typescript
 * zipWith(ofNullable(first), ofNullable(last), (f, l) => `${f} ${l}`);
 * ```
 */
export function zipWith<A, B, C>(
  a: Option<A>,
  b: Option<B>,
  fn: (a: A, b: B) => C | null | undefined
): Option<C> {
  return a.present && b.present ? ofNullable(fn(a.value, b.value)) : NONE;
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * Get the value or a default.
 */
export function orElse<T, D = T>(option: Option<T>, defaultValue: D): T | D {
  return option.present ? option.value : defaultValue;
}

/**
 * Get the value or compute a default lazily. The supplier runs only when
 * the Option is empty.
 */
export function orElseGet<T, D = T>(option: Option<T>, supplier: Supplier<D>): T | D {
  return option.present ? option.value : supplier();
}

/**
 * Get the value or throw. Without a supplier, throws NoSuchElementError.
 *
 * @example
 * ```typescript
 * orElseThrow(empty(), () => new IllegalArgumentError({ argument: 'id', reason: 'is unknown' }));
 * ```
 */
export function orElseThrow<T>(option: Option<T>, errorSupplier?: Supplier<unknown>): T {
  if (option.present) {
    return option.value;
  }
  throw errorSupplier ? errorSupplier() : new NoSuchElementError({});
}

export function ifPresent<T>(option: Option<T>, consumer: Consumer<T>): void {
  if (option.present) {
    consumer(option.value);
  }
}

export function ifPresentOrElse<T>(option: Option<T>, consumer: Consumer<T>, otherwise: Runnable): void {
  if (option.present) {
    consumer(option.value);
  } else {
    otherwise();
  }
}

// =============================================================================
// Conversions
// =============================================================================

export function toArray<T>(option: Option<T>): T[] {
  return option.present ? [option.value] : [];
}

/**
 * Compare two Options; values are compared with `equality` (SameValueZero by default).
 */
export function equals<T>(
  a: Option<T>,
  b: Option<T>,
  equality: (x: T, y: T) => boolean = sameValueZero
): boolean {
  if (a.present && b.present) return equality(a.value, b.value);
  return a.present === b.present;
}

function sameValueZero(x: unknown, y: unknown): boolean {
  return x === y || (Number.isNaN(x) && Number.isNaN(y));
}

/**
 * Render as `Option[value]` or `Option.empty`.
 */
export function format<T>(option: Option<T>): string {
  return option.present ? `Option[${String(option.value)}]` : "Option.empty";
}

export function toResult<T, E>(option: Option<T>, error: E): Result<T, E> {
  return option.present ? ok(option.value) : err(error);
}

/**
 * Keep an Ok value (unless it is null or undefined); drop the error.
 */
export function fromResult<T, E>(result: Result<T, E>): Option<T> {
  return result.ok ? ofNullable(result.value) : NONE;
}

// =============================================================================
// Pipeable Option Functions (O namespace)
// =============================================================================

function curriedFilter<T, S extends T>(predicate: (value: T) => value is S): (option: Option<T>) => Option<S>;
function curriedFilter<T>(predicate: Predicate<T>): (option: Option<T>) => Option<T>;
function curriedFilter<T>(predicate: Predicate<T>): (option: Option<T>) => Option<T> {
  return (option) => filter(option, predicate);
}

/**
 * Curried Option combinators for use in pipe().
 *
 * @example
 * ```typescript
 * pipe(
 *   findCountryByCode(code),
 *   O.flatMap(findCapitalByCountry),
 *   O.orElse('Salamanca')
 * );
 * ```
 */
export const O = {
  /** Curried map for use in pipe() */
  map:
    <T, U>(fn: (value: T) => U | null | undefined) =>
    (option: Option<T>): Option<U> =>
      map(option, fn),

  /** Curried flatMap for use in pipe() */
  flatMap:
    <T, U>(fn: (value: T) => Option<U>) =>
    (option: Option<T>): Option<U> =>
      flatMap(option, fn),

  /** Curried filter for use in pipe() */
  filter: curriedFilter,

  /** Curried or for use in pipe() */
  or:
    <T>(supplier: Supplier<Option<T>>) =>
    (option: Option<T>): Option<T> =>
      or(option, supplier),

  /** Curried match for use in pipe() */
  match:
    <T, R>(matchers: OptionMatchers<T, R>) =>
    (option: Option<T>): R =>
      match(option, matchers),

  /** Curried orElse for use in pipe() */
  orElse:
    <T, D = T>(defaultValue: D) =>
    (option: Option<T>): T | D =>
      orElse(option, defaultValue),

  /** Curried orElseGet for use in pipe() */
  orElseGet:
    <T, D = T>(supplier: Supplier<D>) =>
    (option: Option<T>): T | D =>
      orElseGet(option, supplier),

  /** Curried orElseThrow for use in pipe() */
  orElseThrow:
    <T>(errorSupplier?: Supplier<unknown>) =>
    (option: Option<T>): T =>
      orElseThrow(option, errorSupplier),
};

// =============================================================================
// Option namespace
// =============================================================================

/**
 * Every Option function under one name, for call sites that read better
 * qualified: `Option.ofNullable(x)`, `Option.orElse(o, d)`.
 */
export const Option = {
  of,
  ofNullable,
  empty,
  isOption,
  isPresent,
  isEmpty,
  get,
  map,
  flatMap,
  filter,
  or,
  match,
  zipWith,
  orElse,
  orElseGet,
  orElseThrow,
  ifPresent,
  ifPresentOrElse,
  toArray,
  equals,
  format,
  toResult,
  fromResult,
} as const;
