import type { BiFn, Comparator, Fn } from "./index";

type Comparable = string | number | bigint | boolean | Date;

/**
 * Ascending order for strings, numbers, bigints, booleans and dates.
 */
export const naturalOrder =
  <T extends Comparable>(): Comparator<T> =>
  (a, b) =>
    a < b ? -1 : a > b ? 1 : 0;

/**
 * Descending order for strings, numbers, bigints, booleans and dates.
 */
export const reverseOrder =
  <T extends Comparable>(): Comparator<T> =>
  (a, b) =>
    a < b ? 1 : a > b ? -1 : 0;

/**
 * Compare values by an extracted key.
 *
 * @example
 * ```typescript
 * const byLength = comparing((s: string) => s.length);
 * ['ccc', 'a', 'bb'].sort(byLength); // ['a', 'bb', 'ccc']
 * ```
 */
export function comparing<T, K extends Comparable>(keyFn: Fn<T, K>): Comparator<T>;
export function comparing<T, K>(keyFn: Fn<T, K>, keyComparator: Comparator<K>): Comparator<T>;
export function comparing<T, K>(keyFn: Fn<T, K>, keyComparator?: Comparator<K>): Comparator<T> {
  if (keyComparator) {
    return (a, b) => keyComparator(keyFn(a), keyFn(b));
  }
  return (a, b) => compareUnknown(keyFn(a), keyFn(b));
}

function compareUnknown(a: unknown, b: unknown): number {
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  const x = Number(a);
  const y = Number(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Use `second` to break ties left by `first`.
 */
export const thenComparing =
  <T>(first: Comparator<T>, second: Comparator<T>): Comparator<T> =>
  (a, b) => {
    const order = first(a, b);
    return order !== 0 ? order : second(a, b);
  };

export const reversed =
  <T>(comparator: Comparator<T>): Comparator<T> =>
  (a, b) =>
    comparator(b, a);

/**
 * Case-insensitive string equality, usable wherever a two-argument
 * function is expected.
 */
export const equalsIgnoreCase: BiFn<string, string, boolean> = (a, b) =>
  a.length === b.length && a.toLowerCase() === b.toLowerCase();
