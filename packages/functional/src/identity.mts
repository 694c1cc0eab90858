/**
 * @module identity
 * @description The Identity applicative: a value in the plainest possible context.
 * When it holds functions, `fmap` composes them right to left, mirroring
 * `Fun.compose`, and `apply` runs the result.
 *
 * @example
 * ```typescript
 * import { identity } from './identity.mjs';
 *
 * const inc = (x: number) => x + 1;
 * const double = (x: number) => x * 2;
 *
 * identity(inc).fmap(identity(double)).apply(5); // => 11
 * ```
 *
 * @category Containers
 * @since 2026-10-18
 */

/**
 * @template A - The held value, often a function
 */
export class Identity<A> {
  constructor(public readonly value: A) {}

  /**
   * Composes two held functions: the result holds `x => this.value(other.value(x))`.
   */
  fmap<X, B, C>(
    this: Identity<(b: B) => C>,
    other: Identity<(x: X) => B>,
  ): Identity<(x: X) => C> {
    const f = this.value;
    const g = other.value;
    return new Identity((x: X) => f(g(x)));
  }

  /**
   * Runs the held function on `x`.
   */
  apply<B, C>(this: Identity<(b: B) => C>, x: B): C {
    return this.value(x);
  }

  /**
   * Plain functor map over the held value.
   */
  map<B>(f: (value: A) => B): Identity<B> {
    return new Identity(f(this.value));
  }
}

/**
 * Identity under its applicative name.
 */
export type Pure<A> = Identity<A>;

export const identity = <A,>(value: A): Identity<A> => new Identity(value);

/**
 * Alias of `identity`.
 */
export const pure = identity;
