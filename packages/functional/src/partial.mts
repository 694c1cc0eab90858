/**
 * @module partial
 * @description Partial application with batched argument supply.
 * `partial(fn)` returns a function that accepts `fn`'s arguments one at a time,
 * several at once, or all at once, in any mixture, and calls `fn` exactly once
 * when enough have arrived.
 *
 * ### For Dummies
 * - The arity comes from `fn.length` unless you pass it yourself.
 * - Each call returns a new partially-applied function; earlier ones are
 *   untouched and can be reused for other completions.
 * - Arguments are always passed to `fn` in the order they were supplied.
 *
 * ### Decision Tree
 * - Plain function with required parameters? `partial(fn)`.
 * - Rest parameters, defaulted parameters, or a native/bound function?
 *   `partial(fn, arity)`, or `curry2`..`curry8`.
 * - Strictly one argument per call and nothing dynamic? `curry2`..`curry8`.
 *
 * @example
 * ```typescript
 * import { partial } from './partial.mjs';
 *
 * const add = partial((a: number, b: number, c: number) => a + b + c);
 *
 * add(1)(2)(3); // => 6
 * add(1, 2)(3); // => 6
 * add(1, 2, 3); // => 6
 *
 * const addTen = add(4, 6);
 * addTen(1); // => 11
 * addTen(2); // => 12
 * ```
 *
 * @category Function Transformation
 * @since 2026-10-18
 */

import { ArityResolutionError, InvalidArityError } from "./errors.mjs";

/**
 * Every prefix of a parameter list, the empty one included.
 */
type Prefix<Args extends unknown[]> = Args extends [
  infer Head,
  ...infer Rest extends unknown[],
]
  ? [] | [Head, ...Prefix<Rest>]
  : [];

/**
 * `Args` without its first `Supplied["length"]` entries.
 */
type Drop<
  Args extends unknown[],
  Supplied extends unknown[],
> = Supplied extends [unknown, ...infer SuppliedRest extends unknown[]]
  ? Args extends [unknown, ...infer ArgsRest extends unknown[]]
    ? Drop<ArgsRest, SuppliedRest>
    : []
  : Args;

/**
 * The first `N` parameters of `Args`. A rest element repeats to fill the
 * count; past the end of a fixed list the extra slots are `unknown`.
 */
type Take<
  Args extends unknown[],
  N extends number,
  Acc extends unknown[] = [],
> = Acc["length"] extends N
  ? Acc
  : Args extends [infer Head, ...infer Rest extends unknown[]]
    ? Take<Rest, N, [...Acc, Head]>
    : Take<Args, N, [...Acc, Args extends [] ? unknown : Args[number]]>;

/**
 * A function still waiting for the parameters `Args` of a function
 * returning `R`. Optional parameters count as already satisfied.
 */
export type PartiallyApplied<Args extends unknown[], R> = <
  Supplied extends Prefix<Args>,
>(
  ...args: Supplied
) => Drop<Args, Supplied> extends infer Rest extends unknown[]
  ? [] extends Rest
    ? R
    : PartiallyApplied<Rest, R>
  : never;

/**
 * The typing available when the arity is only known at run time.
 */
export type Accumulating<T, R> = (...args: T[]) => R | Accumulating<T, R>;

/**
 * `never` for a negative or fractional literal arity, which `partial` rejects.
 */
export type ExplicitlyPartial<
  Args extends unknown[],
  R,
  N extends number,
> = number extends N
  ? Accumulating<Args[number], R>
  : `${N}` extends `-${string}` | `${string}.${string}`
    ? never
    : PartiallyApplied<Take<Args, N>, R>;

type Target = (...args: never) => unknown;

type Accumulator = (...args: unknown[]) => unknown;

const resolveArity = (fn: Target, arity: number | undefined): number => {
  if (arity !== undefined) {
    if (!Number.isInteger(arity) || arity < 0) {
      throw new InvalidArityError(arity);
    }
    return arity;
  }

  if (fn.length === 0) {
    throw new ArityResolutionError(fn.name);
  }
  return fn.length;
};

// never mutates `supplied`: earlier accumulators must stay reusable
const accumulate =
  (fn: Target, arity: number, supplied: readonly unknown[]): Accumulator =>
  (...args: unknown[]) => {
    const accumulated = [...supplied, ...args];
    if (accumulated.length >= arity) {
      const result: unknown = Reflect.apply(fn, undefined, accumulated);
      return result;
    }
    return accumulate(fn, arity, accumulated);
  };

/**
 * Creates a partially applicable version of `fn`.
 * @description The arity is `fn.length` when `arity` is omitted. A function
 * reporting a length of 0 (rest-only, all-defaulted, or some native and bound
 * functions) cannot be resolved, and `partial` throws an
 * `ArityResolutionError` right away rather than on the first call.
 * Once the accumulated argument count reaches the arity, `fn` is called with
 * all of them, extra arguments included, and its result is returned.
 *
 * Note: TypeScript optional parameters without a default still count towards
 * `fn.length`; pass `arity` to make them optional at run time as well.
 *
 * @throws {ArityResolutionError} no `arity` given and `fn.length` is 0
 * @throws {InvalidArityError} `arity` is negative or not an integer
 *
 * @example
 * // explicit arity for a rest-parameter function
 * const product = partial((...xs: number[]) => xs.reduce((a, b) => a * b, 1), 3);
 * product(2)(3)(4); // => 24
 *
 * @example
 * // fixing leading arguments for a pipeline
 * const plus = (a: number, b: number, c: number) => a + b + c;
 * const times = (x: number, y: number) => x * y;
 *
 * const addThirty: (c: number) => number = partial(plus)(10, 20);
 * const hundredTimes: (y: number) => number = partial(times)(100);
 *
 * arrow(addThirty).composeTo(arrow(hundredTimes)).apply(42); // => 7200
 *
 * @see curry3 - One argument per call, no arity inspection
 */
export function partial<Args extends unknown[], R>(
  fn: (...args: Args) => R,
): PartiallyApplied<Args, R>;
export function partial<Args extends unknown[], R, N extends number>(
  fn: (...args: Args) => R,
  arity: N,
): ExplicitlyPartial<Args, R, N>;
export function partial(fn: Target, arity?: number): unknown {
  return accumulate(fn, resolveArity(fn, arity), []);
}
