/**
 * @module list
 * @description Array helpers shaped for composition.
 * Every helper is data-last: the ones that take a function or a separator are
 * curried, so each fully configured helper is a unary function that drops
 * straight into `fun`/`arrow`. Inputs are never mutated.
 *
 * ### For Dummies
 * - `map(f)` is a function waiting for an array, so `arrow(map(f))` works.
 * - Lookups that may come up empty (`head`, `last`, `find`) return a `Maybe`.
 * - Folds without a seed (`foldl1`, `foldr1`, `maximum`, `minimum`) throw an
 *   `EmptyListError` on an empty array.
 *
 * @example
 * ```typescript
 * import { arrow } from './arrow.mjs';
 * import { filter, map, sum } from './list.mjs';
 *
 * const sumOfEvenSquares = arrow(filter((n: number) => n % 2 === 0))
 *   .composeTo(arrow(map((n: number) => n * n)))
 *   .composeTo(arrow(sum));
 *
 * sumOfEvenSquares.apply([1, 2, 3, 4]); // => 20
 * ```
 *
 * @category Utilities
 * @since 2026-10-18
 */

import { EmptyListError } from "./errors.mjs";
import { just, nothing } from "./maybe.mjs";

import type { Maybe } from "./maybe.mjs";

type Ordered = number | string;

const ascending = <T extends Ordered>(a: T, b: T): number =>
  a < b ? -1 : a > b ? 1 : 0;

export const map =
  <T, U>(fn: (item: T) => U) =>
  (arr: readonly T[]): U[] =>
    arr.map((item) => fn(item));

export const filter =
  <T,>(predicate: (item: T) => boolean) =>
  (arr: readonly T[]): T[] =>
    arr.filter((item) => predicate(item));

/**
 * Map then flatten one level.
 *
 * @example
 * flatMap((s: string) => s.split(","))(["a,b", "c"]); // => ["a", "b", "c"]
 */
export const flatMap =
  <T, U>(fn: (item: T) => readonly U[]) =>
  (arr: readonly T[]): U[] =>
    arr.flatMap((item) => fn(item));

/**
 * Alias of `flatMap`.
 */
export const concatMap = flatMap;

/**
 * Left fold with a seed.
 *
 * @example
 * foldl((acc: string, s: string) => acc + s, ">")(["a", "b"]); // => ">ab"
 */
export const foldl =
  <T, U>(fn: (acc: U, item: T) => U, init: U) =>
  (arr: readonly T[]): U =>
    arr.reduce((acc, item) => fn(acc, item), init);

/**
 * Alias of `foldl`.
 */
export const reduce = foldl;

/**
 * Right fold with a seed. The accumulator is the second argument.
 *
 * @example
 * foldr((s: string, acc: string) => acc + s, ">")(["a", "b"]); // => ">ba"
 */
export const foldr =
  <T, U>(fn: (item: T, acc: U) => U, init: U) =>
  (arr: readonly T[]): U =>
    arr.reduceRight((acc, item) => fn(item, acc), init);

/**
 * Left fold seeded with the first element.
 * @throws {EmptyListError} on an empty array
 */
export const foldl1 =
  <T,>(fn: (acc: T, item: T) => T) =>
  (arr: readonly T[]): T => {
    if (arr.length === 0) {
      throw new EmptyListError("foldl1");
    }
    return arr.reduce((acc, item) => fn(acc, item));
  };

/**
 * Right fold seeded with the last element.
 * @throws {EmptyListError} on an empty array
 */
export const foldr1 =
  <T,>(fn: (item: T, acc: T) => T) =>
  (arr: readonly T[]): T => {
    if (arr.length === 0) {
      throw new EmptyListError("foldr1");
    }
    return arr.reduceRight((acc, item) => fn(item, acc));
  };

export const flatten = <T,>(arr: readonly (readonly T[])[]): T[] =>
  arr.flatMap((inner) => [...inner]);

export const join =
  (separator: string) =>
  (arr: readonly string[]): string =>
    arr.join(separator);

export const sum = (arr: readonly number[]): number =>
  arr.reduce((total, n) => total + n, 0);

/**
 * Product of all elements; 1 for an empty array.
 */
export const product = (arr: readonly number[]): number =>
  arr.reduce((total, n) => total * n, 1);

export const length = <T,>(arr: readonly T[]): number => arr.length;

export const isEmpty = <T,>(arr: readonly T[]): boolean => arr.length === 0;

export const head = <T,>(arr: readonly T[]): Maybe<T> =>
  arr.length > 0 ? just(arr[0] as T) : nothing<T>();

export const last = <T,>(arr: readonly T[]): Maybe<T> =>
  arr.length > 0 ? just(arr[arr.length - 1] as T) : nothing<T>();

/**
 * Everything but the first element.
 */
export const tail = <T,>(arr: readonly T[]): T[] => arr.slice(1);

/**
 * Everything but the last element.
 */
export const init = <T,>(arr: readonly T[]): T[] => arr.slice(0, -1);

export const reverse = <T,>(arr: readonly T[]): T[] => [...arr].reverse();

/**
 * @throws {EmptyListError} on an empty array
 */
export const maximum = <T extends Ordered>(arr: readonly T[]): T => {
  if (arr.length === 0) {
    throw new EmptyListError("maximum");
  }
  return arr.reduce((max, item) => (item > max ? item : max));
};

/**
 * @throws {EmptyListError} on an empty array
 */
export const minimum = <T extends Ordered>(arr: readonly T[]): T => {
  if (arr.length === 0) {
    throw new EmptyListError("minimum");
  }
  return arr.reduce((min, item) => (item < min ? item : min));
};

/**
 * Ascending sort by `<`, so numbers sort numerically (unlike `Array.prototype.sort`).
 *
 * @example
 * sort([10, 9, 1]); // => [1, 9, 10]
 */
export const sort = <T extends Ordered>(arr: readonly T[]): T[] =>
  [...arr].sort(ascending);

/**
 * Stable ascending sort by a derived key.
 *
 * @example
 * sortBy((u: { age: number }) => u.age)([{ age: 40 }, { age: 7 }]);
 * // => [{ age: 7 }, { age: 40 }]
 */
export const sortBy =
  <T, K extends Ordered>(key: (item: T) => K) =>
  (arr: readonly T[]): T[] =>
    [...arr].sort((a, b) => ascending(key(a), key(b)));

/**
 * Stable sort with a comparator returning a negative, zero or positive number.
 */
export const sortWith =
  <T,>(compare: (a: T, b: T) => number) =>
  (arr: readonly T[]): T[] =>
    [...arr].sort(compare);

/**
 * Removes duplicates (by `SameValueZero`), keeping first occurrences.
 */
export const unique = <T,>(arr: readonly T[]): T[] => [...new Set(arr)];

/**
 * Groups elements by a computed key, keys in first-seen order.
 *
 * @example
 * groupBy((n: number) => (n % 2 === 0 ? "even" : "odd"))([1, 2, 3]);
 * // => Map { "odd" => [1, 3], "even" => [2] }
 */
export const groupBy =
  <T, K>(keyFn: (item: T) => K) =>
  (arr: readonly T[]): Map<K, T[]> => {
    const groups = new Map<K, T[]>();
    for (const item of arr) {
      const key = keyFn(item);
      const group = groups.get(key);
      if (group) {
        group.push(item);
      } else {
        groups.set(key, [item]);
      }
    }
    return groups;
  };

export const find =
  <T,>(predicate: (item: T) => boolean) =>
  (arr: readonly T[]): Maybe<T> => {
    const index = arr.findIndex((item) => predicate(item));
    return index >= 0 ? just(arr[index] as T) : nothing<T>();
  };
