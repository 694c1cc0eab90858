/**
 * @module fun
 * @description A wrapper around a function that composes right to left,
 * the way mathematics writes `f ∘ g`.
 * Composition is lazy: nothing is called until `apply`, and a composed wrapper
 * can be applied any number of times.
 *
 * ### Decision Tree
 * - Reading the chain as "f of g of x"? Use `fun(f).compose(fun(g))`.
 * - Reading it as "x, then f, then g"? Use `arrow` from `./arrow.mjs` instead.
 * - Holding a value and one function to run on it? `Fun.wrap(x).applyFinal(f)`.
 *
 * @example
 * ```typescript
 * import { fun } from './fun.mjs';
 *
 * const inc = (x: number) => x + 1;
 * const double = (x: number) => x * 2;
 *
 * fun(inc).compose(fun(double)).apply(5); // => 11, inc(double(5))
 * ```
 *
 * @category Core
 * @since 2026-10-18
 */

import { unpack } from "./multi-value.mjs";

import type { Unpacked } from "./multi-value.mjs";

/**
 * A function from `Args` to `R` as a composable value.
 * @description Holds the wrapped function in `raw` and never changes it.
 * A function returning a `MultiValue` feeds all of its items to the function
 * composed after it.
 *
 * @template Args - Parameter list of the wrapped function
 * @template R - Return type of the wrapped function
 *
 * @category Core Types
 */
export class Fun<Args extends unknown[], R> {
  constructor(public readonly raw: (...args: Args) => R) {}

  /**
   * Right-to-left composition.
   * @description `fun(f).compose(fun(g))` computes `f(g(x…))`. Every argument
   * reaches `g` and every value `g` returns reaches `f`.
   *
   * @example
   * const toLabel = (n: number) => `#${n}`;
   * const length = (s: string) => s.length;
   *
   * fun(toLabel).compose(fun(length)).apply("abc"); // => "#3"
   *
   * @example
   * // multiple values between stages
   * const split = (x: number) => values(x, x * 2);
   * const addBoth = (a: number, b: number) => a + b;
   *
   * fun(addBoth).compose(fun(split)).apply(5); // => 15
   *
   * @see Arrow.composeTo - Left-to-right composition
   */
  compose<Before extends unknown[], Mid>(
    this: Fun<Unpacked<Mid>, R>,
    other: Fun<Before, Mid>,
  ): Fun<Before, R> {
    const outer = this.raw;
    const inner = other.raw;
    return new Fun((...args: Before) => outer(...unpack(inner(...args))));
  }

  /**
   * Calls the wrapped function with `args` and returns its result unmodified.
   * Errors thrown by the wrapped function propagate unchanged.
   */
  apply(...args: Args): R {
    return this.raw(...args);
  }

  /**
   * Lifts a plain value so a function can be applied to it, value first.
   *
   * @example
   * Fun.wrap(42).applyFinal((x: number) => x + 1); // => 43
   */
  static wrap<A>(value: A): FunValue<A> {
    return new FunValue(value);
  }
}

/**
 * A value waiting for one function, raw or wrapped.
 */
export class FunValue<A> {
  constructor(public readonly value: A) {}

  applyFinal<B>(f: Fun<[A], B>): B;
  applyFinal<B>(f: (x: A) => B): B;
  applyFinal<B>(f: ((x: A) => B) | Fun<[A], B>): B {
    return f instanceof Fun ? f.apply(this.value) : f(this.value);
  }
}

/**
 * Wraps a function in a `Fun`.
 *
 * @example
 * const calculate = fun(Math.round)
 *   .compose(fun(Math.sqrt))
 *   .compose(fun(Math.abs));
 *
 * calculate.apply(-16.8); // => 4
 */
export const fun = <Args extends unknown[], R>(
  f: (...args: Args) => R,
): Fun<Args, R> => new Fun(f);
