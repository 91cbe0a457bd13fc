/**
 * lambdakit/tagged-error
 *
 * Tagged error classes: errors that form discriminated unions.
 *
 * @example
 * ```typescript
 * import { TaggedError } from 'lambdakit/tagged-error';
 *
 * class EmptyCart extends TaggedError('EmptyCart', {
 *   message: (p: { cartId: string }) => `EmptyCart: cart ${p.cartId} has no items`,
 * }) {}
 *
 * const error = new EmptyCart({ cartId: 'c-1' });
 * error._tag; // 'EmptyCart'
 * error.cartId; // 'c-1'
 * ```
 */

export {
  // Factory function
  TaggedError,

  // Types
  TaggedErrorBase,
  type TaggedErrorOptions,
  type TaggedErrorCreateOptions,
  type TaggedErrorConstructor,
  type TaggedErrorHandlers,

  // Type utilities
  type TagOf,
  type ErrorByTag,
  type PropsOf,
} from "./tagged-error";
