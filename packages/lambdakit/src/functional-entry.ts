/**
 * lambdakit/functional
 *
 * Function types and combinators for building behaviour out of small
 * functions.
 *
 * @example
 * ```typescript
 * import { and, negate, pipe, andThen } from 'lambdakit/functional';
 *
 * const isMultipleOfSix = and((n: number) => n % 2 === 0, (n: number) => n % 3 === 0);
 * const squareThenDouble = andThen((x: number) => x * x, (x) => x * 2);
 * squareThenDouble(5); // 50
 * ```
 */

export {
  // Composition
  pipe,
  flow,
  compose,
  andThen,
  composeWith,
  identity,
  constant,
  curry,
  uncurry,

  // Predicates
  and,
  or,
  negate,
  not,
  isEqual,
  alwaysTrue,
  alwaysFalse,

  // Consumers and suppliers
  andThenConsumer,
  memoize,

  // Binary operators and comparators
  minBy,
  maxBy,
  naturalOrder,
  reverseOrder,
  comparing,
  thenComparing,
  reversed,
  equalsIgnoreCase,

  // Types
  type Fn,
  type BiFn,
  type UnaryOperator,
  type BinaryOperator,
  type Predicate,
  type BiPredicate,
  type Consumer,
  type BiConsumer,
  type Supplier,
  type Runnable,
  type Comparator,
  type Memoized,
} from "./functional";
