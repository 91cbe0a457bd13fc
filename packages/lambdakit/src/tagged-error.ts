/**
 * lambdakit/tagged-error (internal)
 *
 * Tagged error classes: errors that carry a literal `_tag` discriminant and
 * their props as readonly fields, so a union of them can be matched
 * exhaustively.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Options accepted by the TaggedError factory.
 */
export interface TaggedErrorOptions<P> {
  /** Builds the error message from the props passed to the constructor */
  message?: (props: P) => string;
}

/**
 * Options accepted by a tagged error constructor.
 */
export interface TaggedErrorCreateOptions {
  /** Underlying error, exposed as the standard `cause` property */
  cause?: unknown;
}

/**
 * Common base of every tagged error.
 */
export abstract class TaggedErrorBase<Tag extends string = string> extends Error {
  abstract readonly _tag: Tag;
}

/**
 * Constructor returned by TaggedError(). Instances expose the props as fields.
 */
export interface TaggedErrorConstructor<Tag extends string, P extends object> {
  new (props: P, options?: TaggedErrorCreateOptions): TaggedErrorBase<Tag> & { readonly _tag: Tag } & Readonly<P>;
  readonly tag: Tag;
}

/** Extract the tag of a tagged error type. */
export type TagOf<E> = E extends { readonly _tag: infer T } ? T : never;

/** Narrow a union of tagged errors to the member carrying tag `T`. */
export type ErrorByTag<E, T extends string> = Extract<E, { readonly _tag: T }>;

/** Props of a tagged error type (everything but the Error fields). */
export type PropsOf<E> = Omit<E, keyof TaggedErrorBase | "_tag">;

/** Handlers for TaggedError.match, one per tag in the union. */
export type TaggedErrorHandlers<E extends TaggedErrorBase, R> = {
  [K in TagOf<E>]: (error: ErrorByTag<E, K>) => R;
};

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a tagged error class.
 *
 * @example
 * ```typescript
 * class InvalidAge extends TaggedError('InvalidAge', {
 *   message: (p: { age: number }) => `InvalidAge: ${p.age} is not a valid age`,
 * }) {}
 *
 * const error = new InvalidAge({ age: -1 });
 * error._tag; // 'InvalidAge'
 * error.age; // -1
 * ```
 */
export function TaggedError<Tag extends string, P extends object = Record<string, never>>(
  tag: Tag,
  options?: TaggedErrorOptions<P>
): TaggedErrorConstructor<Tag, P> {
  const format = options?.message ?? (() => tag);

  class Tagged extends TaggedErrorBase<Tag> {
    static readonly tag = tag;
    readonly _tag = tag;

    constructor(props: P, createOptions?: TaggedErrorCreateOptions) {
      super(format(props), createOptions && "cause" in createOptions ? { cause: createOptions.cause } : undefined);
      Object.assign(this, props);
      this.name = tag;
    }
  }

  // Props are copied onto the instance in the constructor; the class type cannot say so.
  return Tagged as unknown as TaggedErrorConstructor<Tag, P>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace TaggedError {
  /**
   * Check whether a value is any tagged error.
   */
  export function isTaggedError(value: unknown): value is TaggedErrorBase {
    return value instanceof TaggedErrorBase;
  }

  /**
   * Exhaustively match a union of tagged errors on `_tag`.
   *
   * @example
   * ```typescript
   * TaggedError.match(error, {
   *   NoSuchElementError: () => 'missing',
   *   NullReferenceError: (e) => `null ${e.reference}`,
   * });
   * ```
   */
  export function match<E extends TaggedErrorBase, R>(error: E, handlers: TaggedErrorHandlers<E, R>): R {
    // Each handler accepts its own member of E; looked up by tag, the pairing holds.
    const table = handlers as unknown as Partial<Record<string, (error: E) => R>>;
    const handler = table[error._tag];
    if (!handler) {
      throw new Error(`No handler for tagged error "${error._tag}"`);
    }
    return handler(error);
  }
}
