/**
 * lambdakit/errors entry point
 *
 * Errors thrown on misuse of the library.
 */
export {
  // Pre-built errors
  NoSuchElementError,
  NullReferenceError,
  IllegalArgumentError,
  IllegalStateError,
  UnsupportedOperationError,
  UnboundedSequenceError,
  // Union type
  type LambdakitError,
  // Type guards
  isNoSuchElementError,
  isNullReferenceError,
  isIllegalArgumentError,
  isIllegalStateError,
  isUnsupportedOperationError,
  isUnboundedSequenceError,
  isLambdakitError,
} from "./errors";
