/**
 * @module curry
 * @description Fixed-arity currying and argument swapping.
 * `curryN` turns an N-ary function into N nested unary functions. No arity is
 * inspected, so these work for any callable, native and bound functions
 * included; every step takes exactly one argument. For a function that should
 * accept its arguments in batches of any size, see `partial`.
 *
 * @example
 * ```typescript
 * import { curry3, swap } from './curry.mjs';
 *
 * const volume = curry3((l: number, w: number, h: number) => l * w * h);
 * volume(2)(3)(4); // => 24
 *
 * const minus = (a: number, b: number) => a - b;
 * swap(minus)(10, 3); // => -7, minus(3, 10)
 * ```
 *
 * @category Function Transformation
 * @since 2026-10-18
 */

/**
 * Curry a binary function.
 *
 * @example
 * const multiply = curry2((factor: number, value: number) => value * factor);
 * const double = multiply(2);
 *
 * [1, 2, 3].map(double); // => [2, 4, 6]
 *
 * @see partial - Batched argument supply
 */
export const curry2 =
  <A, B, R>(fn: (a: A, b: B) => R) =>
  (a: A) =>
  (b: B): R =>
    fn(a, b);

/**
 * Alias of `curry2`.
 */
export const curry = curry2;

export const curry3 =
  <A, B, C, R>(fn: (a: A, b: B, c: C) => R) =>
  (a: A) =>
  (b: B) =>
  (c: C): R =>
    fn(a, b, c);

export const curry4 =
  <A, B, C, D, R>(fn: (a: A, b: B, c: C, d: D) => R) =>
  (a: A) =>
  (b: B) =>
  (c: C) =>
  (d: D): R =>
    fn(a, b, c, d);

export const curry5 =
  <A, B, C, D, E, R>(fn: (a: A, b: B, c: C, d: D, e: E) => R) =>
  (a: A) =>
  (b: B) =>
  (c: C) =>
  (d: D) =>
  (e: E): R =>
    fn(a, b, c, d, e);

export const curry6 =
  <A, B, C, D, E, F, R>(fn: (a: A, b: B, c: C, d: D, e: E, f: F) => R) =>
  (a: A) =>
  (b: B) =>
  (c: C) =>
  (d: D) =>
  (e: E) =>
  (f: F): R =>
    fn(a, b, c, d, e, f);

export const curry7 =
  <A, B, C, D, E, F, G, R>(
    fn: (a: A, b: B, c: C, d: D, e: E, f: F, g: G) => R,
  ) =>
  (a: A) =>
  (b: B) =>
  (c: C) =>
  (d: D) =>
  (e: E) =>
  (f: F) =>
  (g: G): R =>
    fn(a, b, c, d, e, f, g);

export const curry8 =
  <A, B, C, D, E, F, G, H, R>(
    fn: (a: A, b: B, c: C, d: D, e: E, f: F, g: G, h: H) => R,
  ) =>
  (a: A) =>
  (b: B) =>
  (c: C) =>
  (d: D) =>
  (e: E) =>
  (f: F) =>
  (g: G) =>
  (h: H): R =>
    fn(a, b, c, d, e, f, g, h);

/**
 * Swap - takes the two arguments of a binary function in reverse order.
 * `swap(f)(b, a)` calls `f(a, b)`, so `swap(swap(f))` behaves like `f`.
 *
 * @example
 * const divide = (a: number, b: number) => a / b;
 * const divideInto = swap(divide);
 * divideInto(2, 10); // => 5, divide(10, 2)
 *
 * @example
 * // fixing the second argument through curry
 * const has = (obj: Record<string, unknown>, key: string) => key in obj;
 * const hasKey = curry2(swap(has));
 *
 * [{ name: 'Ann' }, { name: 'Bo', admin: true }].filter(hasKey('admin'));
 * // => [{ name: 'Bo', admin: true }]
 */
export const swap =
  <A, B, R>(fn: (a: A, b: B) => R) =>
  (b: B, a: A): R =>
    fn(a, b);
