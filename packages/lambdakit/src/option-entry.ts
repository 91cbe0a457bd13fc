/**
 * lambdakit/option
 *
 * A container for a value that may be absent.
 *
 * @example
 * ```typescript
 * import { Option, O } from 'lambdakit/option';
 * import { pipe } from 'lambdakit/functional';
 *
 * const greeting = pipe(
 *   Option.ofNullable(user.nickname),
 *   O.map((nick) => `Hi ${nick}`),
 *   O.orElse('Hi there')
 * );
 * ```
 */

export {
  // Namespace
  Option,
  O,

  // Constructors
  of,
  ofNullable,
  empty,
  isOption,

  // Queries
  isPresent,
  isEmpty,
  get,

  // Combinators
  map,
  flatMap,
  filter,
  or,
  match,
  zipWith,

  // Extraction
  orElse,
  orElseGet,
  orElseThrow,
  ifPresent,
  ifPresentOrElse,

  // Conversions
  toArray,
  equals,
  format,
  toResult,
  fromResult,

  // Types
  type Some,
  type None,
  type OptionMatchers,
} from "./option";
