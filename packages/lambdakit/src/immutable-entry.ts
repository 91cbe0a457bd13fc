/**
 * lambdakit/immutable
 *
 * Unmodifiable collections, deep freezing and immutable value classes.
 *
 * @example
 * ```typescript
 * import { listOf, Address } from 'lambdakit/immutable';
 *
 * const cities = listOf('Lisbon', 'Porto');
 * const office = Address.of('Rua Augusta 1', 'Lisbon');
 * ```
 */

export * from "./immutable/index";
