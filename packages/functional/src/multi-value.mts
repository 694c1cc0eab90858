/**
 * @module multi-value
 * @description Explicit "several return values" for composition chains.
 * A wrapped function that returns a `MultiValue` has its items spread into the
 * next function of a `Fun`/`Arrow` composition; any other return value is
 * passed on as the single argument.
 *
 * @example
 * ```typescript
 * import { fun, values } from './index.mjs';
 *
 * const split = (x: number) => values(x, x * 2);
 * const addBoth = (a: number, b: number) => a + b;
 *
 * fun(addBoth).compose(fun(split)).apply(5); // => 15
 * ```
 *
 * @category Core
 * @since 2026-10-18
 */

/**
 * An ordered tuple of values returned together by one function.
 *
 * @template T - The tuple of carried values
 */
export class MultiValue<T extends unknown[]> {
  readonly _tag = "MultiValue";

  constructor(public readonly items: T) {}
}

/**
 * Packs its arguments into a `MultiValue`.
 *
 * @example
 * const minMax = (xs: number[]) => values(Math.min(...xs), Math.max(...xs));
 * minMax([3, 1, 2]).items; // => [1, 3]
 */
export const values = <T extends unknown[]>(...items: T): MultiValue<T> =>
  new MultiValue(items);

export const isMultiValue = (value: unknown): value is MultiValue<unknown[]> =>
  value instanceof MultiValue;

/**
 * The argument list a return value of type `R` turns into when it is handed
 * to the next function of a composition.
 */
export type Unpacked<R> = [R] extends [MultiValue<infer T extends unknown[]>]
  ? T
  : [R];

/**
 * Turns a return value into the argument list for the next function.
 */
export const unpack = <R,>(value: R): Unpacked<R> =>
  // the conditional type cannot be narrowed by instanceof
  (isMultiValue(value) ? value.items : [value]) as Unpacked<R>;
