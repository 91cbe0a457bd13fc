/**
 * lambdakit/result
 *
 * A minimal Result type for callers that would rather receive a failure as a
 * value than catch it: `Circle.parse`, `Option.toResult` and friends.
 */

import { NoSuchElementError } from "./errors";

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { readonly ok: true; readonly value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E> = { readonly ok: false; readonly error: E; readonly cause?: unknown };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown> = Ok<T> | Err<E>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E>(error: E, options?: { cause?: unknown }): Err<E> =>
  options?.cause !== undefined ? { ok: false, error, cause: options.cause } : { ok: false, error };

// =============================================================================
// Type Guards
// =============================================================================

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;

export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

// =============================================================================
// Unwrapping
// =============================================================================

/**
 * Extracts the value from an Ok result, or throws NoSuchElementError if it's
 * an Err. The Err's error becomes the thrown error's `cause`.
 */
export const unwrap = <T, E>(r: Result<T, E>): T => {
  if (r.ok) return r.value;
  throw new NoSuchElementError({ operation: "unwrap" }, { cause: r.error });
};

/**
 * Extracts the value from an Ok result, or returns a default value if it's an Err.
 */
export const unwrapOr = <T, E>(r: Result<T, E>, defaultValue: T): T => (r.ok ? r.value : defaultValue);

// =============================================================================
// Wrapping Functions
// =============================================================================

/**
 * Wraps a synchronous function that might throw into a Result.
 *
 * @example
 * ```typescript
 * fromThrowable(() => JSON.parse('{')); // err(SyntaxError)
 * fromThrowable(() => Circle.of(-1), (e) => String(e)); // err("IllegalArgumentError: ...")
 * ```
 */
export function fromThrowable<T>(fn: () => T): Result<T, unknown>;
export function fromThrowable<T, E>(fn: () => T, onError: (cause: unknown) => E): Result<T, E>;
export function fromThrowable<T, E>(fn: () => T, onError?: (cause: unknown) => E): Result<T, unknown> {
  try {
    return ok(fn());
  } catch (cause) {
    return onError ? err(onError(cause), { cause }) : err(cause);
  }
}
