import { NullReferenceError } from "./errors";

/**
 * Return `value` unchanged, or throw NullReferenceError naming `reference`
 * when it is null or undefined.
 *
 * @example
 * ```typescript
 * const city = requireNonNull(address.city, 'address.city');
 * ```
 */
export function requireNonNull<T>(value: T | null | undefined, reference = "value"): T {
  if (value === null || value === undefined) {
    throw new NullReferenceError({ reference });
  }
  return value;
}

/**
 * Return `value`, or `fallback` when it is null or undefined.
 */
export function requireNonNullElse<T>(value: T | null | undefined, fallback: T): T {
  return value === null || value === undefined ? requireNonNull(fallback, "fallback") : value;
}

/**
 * Check whether a value is neither null nor undefined.
 */
export const isNonNull = <T>(value: T | null | undefined): value is T => value !== null && value !== undefined;
