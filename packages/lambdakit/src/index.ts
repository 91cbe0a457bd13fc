/**
 * lambdakit
 *
 * Functional building blocks: lazy sequences, an Option container,
 * immutable values and composable function types.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Seq, Option, pipe, O } from 'lambdakit';
 *
 * const firstLongWord = Seq.split(sentence, ' ')
 *   .filter((word) => word.length > 6)
 *   .findFirst();
 *
 * const label = pipe(firstLongWord, O.map((w) => w.toUpperCase()), O.orElse('none'));
 * ```
 *
 * ## Entry Points
 *
 * - `lambdakit` - Lambdakit namespace plus the most used names
 * - `lambdakit/seq` - Seq, Collectors, sequence options and events
 * - `lambdakit/option` - Option functions and the curried `O` namespace
 * - `lambdakit/functional` - function types, composition, predicates, comparators
 * - `lambdakit/immutable` - unmodifiable collections, deepFreeze, value classes
 * - `lambdakit/result` - Result type
 * - `lambdakit/errors` - pre-built errors and guards
 * - `lambdakit/tagged-error` - TaggedError factory
 */

import * as result from "./result";
import { TaggedError } from "./tagged-error";
import { Seq, Collectors } from "./seq";
import { Option, O } from "./option";
import { pipe, flow, compose, andThen, composeWith, identity, constant } from "./functional";
import { listOf, copyOf, setOf, mapOf, deepFreeze } from "./immutable";

// =============================================================================
// Lambdakit namespace
// =============================================================================

const Lambdakit = {
  // Result (all value exports)
  ...result,
  // Tagged errors
  TaggedError,
  // Sequences
  Seq,
  Collectors,
  // Option
  Option,
  O,
  // Composition
  pipe,
  flow,
  compose,
  andThen,
  composeWith,
  identity,
  constant,
  // Immutability
  listOf,
  copyOf,
  setOf,
  mapOf,
  deepFreeze,
} as const;

export { Lambdakit };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export { ok, err, isOk, isErr, unwrap, unwrapOr, fromThrowable } from "./result";

export { TaggedError } from "./tagged-error";

export { Seq, Collectors, DEFAULT_SEQ_OPTIONS } from "./seq";

export { Option, O } from "./option";

export {
  pipe,
  flow,
  compose,
  andThen,
  composeWith,
  identity,
  constant,
  curry,
  uncurry,
  and,
  or,
  negate,
  not,
  memoize,
  naturalOrder,
  reverseOrder,
  comparing,
  equalsIgnoreCase,
} from "./functional";

export {
  listOf,
  copyOf,
  unmodifiableView,
  setOf,
  mapOf,
  deepFreeze,
  Address,
  Shipment,
  Circle,
  requireNonNull,
  requireNonNullElse,
} from "./immutable";

export {
  NoSuchElementError,
  NullReferenceError,
  IllegalArgumentError,
  IllegalStateError,
  UnsupportedOperationError,
  UnboundedSequenceError,
  isLambdakitError,
} from "./errors";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

export type { Ok, Err, Result } from "./result";
export type { Some, None, OptionMatchers } from "./option";
export type { Collector, SeqOptions, SeqEvent, UnboundedPolicy } from "./seq";
export type {
  Fn,
  BiFn,
  UnaryOperator,
  BinaryOperator,
  Predicate,
  BiPredicate,
  Consumer,
  BiConsumer,
  Supplier,
  Runnable,
  Comparator,
} from "./functional";
export type { DeepReadonly } from "./immutable";
export type { LambdakitError } from "./errors";
export type { TagOf, ErrorByTag, PropsOf } from "./tagged-error";
