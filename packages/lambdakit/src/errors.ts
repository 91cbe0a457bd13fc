/**
 * lambdakit/errors
 *
 * Pre-built error types raised on programmer misuse: reading an absent value,
 * dereferencing null, mutating an immutable collection, draining an unbounded
 * sequence. Uses TaggedError for exhaustive matching.
 *
 * @example
 * ```typescript
 * import { NoSuchElementError, isLambdakitError } from 'lambdakit/errors';
 *
 * try {
 *   Option.get(Option.empty());
 * } catch (error) {
 *   if (isLambdakitError(error)) {
 *     TaggedError.match(error, {
 *       NoSuchElementError: (e) => e.message,
 *       NullReferenceError: (e) => `${e.reference} was null`,
 *       IllegalArgumentError: (e) => e.reason,
 *       IllegalStateError: (e) => e.reason,
 *       UnsupportedOperationError: (e) => e.operation,
 *       UnboundedSequenceError: (e) => e.operation,
 *     });
 *   }
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";

// =============================================================================
// Pre-built Error Types
// =============================================================================

/**
 * Thrown when a value-absent container is asked for its value without a fallback.
 *
 * @example
 * ```typescript
 * new NoSuchElementError({}).message; // "NoSuchElementError: No value present"
 * new NoSuchElementError({ operation: 'reduce' }).message; // "NoSuchElementError: reduce found no value"
 * ```
 */
export class NoSuchElementError extends TaggedError("NoSuchElementError", {
  message: (p: {
    /** Operation that needed a value */
    operation?: string;
  }) =>
    p.operation
      ? `NoSuchElementError: ${p.operation} found no value`
      : "NoSuchElementError: No value present",
}) {}

/**
 * Thrown when a null or undefined reference is used where a value is required.
 *
 * @example
 * ```typescript
 * new NullReferenceError({ reference: 'address.city' }).message;
 * // "NullReferenceError: address.city is null or undefined"
 * ```
 */
export class NullReferenceError extends TaggedError("NullReferenceError", {
  message: (p: {
    /** Name of the reference that was null or undefined */
    reference: string;
  }) => `NullReferenceError: ${p.reference} is null or undefined`,
}) {}

/**
 * Thrown when an argument is outside the accepted range.
 */
export class IllegalArgumentError extends TaggedError("IllegalArgumentError", {
  message: (p: {
    /** Argument name */
    argument: string;
    /** What is wrong with it */
    reason: string;
    /** Offending value */
    value?: unknown;
  }) => `IllegalArgumentError: ${p.argument} ${p.reason}`,
}) {}

/**
 * Thrown when an operation is invoked at the wrong time, such as a second
 * traversal of a one-shot sequence.
 */
export class IllegalStateError extends TaggedError("IllegalStateError", {
  message: (p: {
    /** Description of the invalid state */
    reason: string;
  }) => `IllegalStateError: ${p.reason}`,
}) {}

/**
 * Thrown when an immutable collection is asked to change.
 *
 * @example
 * ```typescript
 * new UnsupportedOperationError({ operation: 'push' }).message;
 * // "UnsupportedOperationError: push is not supported on an immutable collection"
 * ```
 */
export class UnsupportedOperationError extends TaggedError("UnsupportedOperationError", {
  message: (p: {
    /** Mutating operation that was attempted */
    operation: string;
  }) => `UnsupportedOperationError: ${p.operation} is not supported on an immutable collection`,
}) {}

/**
 * Thrown when an exhaustive terminal operation runs on a sequence that has
 * no limit(), so it would never finish.
 */
export class UnboundedSequenceError extends TaggedError("UnboundedSequenceError", {
  message: (p: {
    /** Terminal operation that was invoked */
    operation: string;
  }) =>
    `UnboundedSequenceError: ${p.operation} on an unbounded sequence; add limit() or takeWhile() first`,
}) {}

// =============================================================================
// Union Type for Library Errors
// =============================================================================

/**
 * Union of all pre-built error types.
 */
export type LambdakitError =
  | NoSuchElementError
  | NullReferenceError
  | IllegalArgumentError
  | IllegalStateError
  | UnsupportedOperationError
  | UnboundedSequenceError;

const LAMBDAKIT_ERROR_TAGS: ReadonlySet<string> = new Set([
  "NoSuchElementError",
  "NullReferenceError",
  "IllegalArgumentError",
  "IllegalStateError",
  "UnsupportedOperationError",
  "UnboundedSequenceError",
]);

// =============================================================================
// Type Guards
// =============================================================================

export function isNoSuchElementError(error: unknown): error is NoSuchElementError {
  return TaggedError.isTaggedError(error) && error._tag === "NoSuchElementError";
}

export function isNullReferenceError(error: unknown): error is NullReferenceError {
  return TaggedError.isTaggedError(error) && error._tag === "NullReferenceError";
}

export function isIllegalArgumentError(error: unknown): error is IllegalArgumentError {
  return TaggedError.isTaggedError(error) && error._tag === "IllegalArgumentError";
}

export function isIllegalStateError(error: unknown): error is IllegalStateError {
  return TaggedError.isTaggedError(error) && error._tag === "IllegalStateError";
}

export function isUnsupportedOperationError(error: unknown): error is UnsupportedOperationError {
  return TaggedError.isTaggedError(error) && error._tag === "UnsupportedOperationError";
}

export function isUnboundedSequenceError(error: unknown): error is UnboundedSequenceError {
  return TaggedError.isTaggedError(error) && error._tag === "UnboundedSequenceError";
}

/**
 * Check if an error is any LambdakitError.
 */
export function isLambdakitError(error: unknown): error is LambdakitError {
  return TaggedError.isTaggedError(error) && LAMBDAKIT_ERROR_TAGS.has(error._tag);
}
