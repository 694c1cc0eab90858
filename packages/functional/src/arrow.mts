/**
 * @module arrow
 * @description The pipeline-order twin of `Fun`: `arrow(f).composeTo(arrow(g))`
 * runs `f` first and `g` second, so the chain reads in the order it executes.
 *
 * @example
 * ```typescript
 * import { arrow } from './arrow.mjs';
 *
 * const result = arrow((x: number) => x + 1)
 *   .composeTo(arrow((x: number) => x * 10))
 *   .composeTo(arrow((x: number) => x - 2))
 *   .apply(42);
 * // => 428, (42 + 1) * 10 - 2
 * ```
 *
 * @category Core
 * @since 2026-10-18
 */

import { unpack } from "./multi-value.mjs";

import type { Unpacked } from "./multi-value.mjs";

/**
 * A function from `Args` to `R` composing left to right.
 *
 * @template Args - Parameter list of the wrapped function
 * @template R - Return type of the wrapped function
 *
 * @category Core Types
 */
export class Arrow<Args extends unknown[], R> {
  constructor(public readonly raw: (...args: Args) => R) {}

  /**
   * Left-to-right composition.
   * @description `arrow(f).composeTo(arrow(g))` computes `g(f(x…))`.
   * When `f` returns a `MultiValue`, its items become `g`'s arguments.
   *
   * @example
   * const parse = (s: string) => Number.parseInt(s, 10);
   * const half = (n: number) => n / 2;
   *
   * arrow(parse).composeTo(arrow(half)).apply("84"); // => 42
   *
   * @see Fun.compose - Right-to-left composition
   */
  composeTo<Next>(other: Arrow<Unpacked<R>, Next>): Arrow<Args, Next> {
    const first = this.raw;
    const second = other.raw;
    return new Arrow((...args: Args) => second(...unpack(first(...args))));
  }

  apply(...args: Args): R {
    return this.raw(...args);
  }

  /**
   * Starts a value-first pipeline.
   *
   * @example
   * Arrow.wrap(42)
   *   .apply((x: number) => x + 1)
   *   .apply((x: number) => x * 10).value; // => 430
   */
  static wrap<A>(value: A): ArrowValue<A> {
    return new ArrowValue(value);
  }
}

// internal only: a plain function's own `apply` defeats inference of `B` from this union
type Step<A, B> = ((x: A) => B) | Arrow<[A], B>;

const runStep = <A, B>(step: Step<A, B>, value: A): B =>
  step instanceof Arrow ? step.apply(value) : step(value);

/**
 * A value travelling down a pipeline of unary steps.
 * `apply` keeps the result wrapped, `applyFinal` hands it back.
 */
export class ArrowValue<A> {
  constructor(public readonly value: A) {}

  apply<B>(step: Arrow<[A], B>): ArrowValue<B>;
  apply<B>(step: (x: A) => B): ArrowValue<B>;
  apply<B>(step: Step<A, B>): ArrowValue<B> {
    return new ArrowValue(runStep<A, B>(step, this.value));
  }

  applyFinal<B>(step: Arrow<[A], B>): B;
  applyFinal<B>(step: (x: A) => B): B;
  applyFinal<B>(step: Step<A, B>): B {
    return runStep<A, B>(step, this.value);
  }
}

export const arrow = <Args extends unknown[], R>(
  f: (...args: Args) => R,
): Arrow<Args, R> => new Arrow(f);
