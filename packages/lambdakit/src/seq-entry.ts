/**
 * lambdakit/seq
 *
 * Lazy, pull-based sequence pipelines.
 *
 * @example
 * ```typescript
 * import { Seq, Collectors } from 'lambdakit/seq';
 *
 * const byInitial = Seq.split('apple avocado banana cherry', ' ')
 *   .filter((word) => word.length > 5)
 *   .collect(Collectors.groupingBy((word) => word[0]));
 * // Map { 'a' => ['avocado'], 'b' => ['banana'], 'c' => ['cherry'] }
 * ```
 */

export * from "./seq/index";
