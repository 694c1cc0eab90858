/**
 * @module maybe
 * @description Maybe: a value that may be absent, as a proper sum type.
 * `Just` carries a value, `Nothing` carries nothing at all, and a container's
 * variant never changes after construction.
 *
 * ### For Dummies
 * - `fmap` changes the value inside a `Just` and leaves a `Nothing` alone.
 * - `bind` is for steps that may themselves produce `Nothing`; the first
 *   `Nothing` ends the chain and later steps are never called.
 * - `orElse` gets the value out, with a fallback for `Nothing`.
 *
 * @example
 * ```typescript
 * import { just, nothing } from './maybe.mjs';
 *
 * const safeDivide = (by: number) => (x: number) =>
 *   by === 0 ? nothing<number>() : just(x / by);
 *
 * just(10).bind(safeDivide(2)).orElse(0); // => 5
 * just(10).bind(safeDivide(0)).fmap((x) => x * 2).orElse(0); // => 0
 * ```
 *
 * @category Containers
 * @since 2026-10-18
 */

/**
 * Methods shared by both variants.
 * @template A - Type of the value when present
 */
abstract class MaybeBase<A> {
  abstract readonly _tag: "Just" | "Nothing";

  isJust(): this is Just<A> {
    return this._tag === "Just";
  }

  isNothing(): this is Nothing<A> {
    return this._tag === "Nothing";
  }

  /**
   * `Just(x)` becomes `Just(f(x))`; `Nothing` stays `Nothing` and `f` is not called.
   */
  fmap<B>(this: Maybe<A>, f: (value: A) => B): Maybe<B> {
    return this.isJust() ? just(f(this.value)) : nothing<B>();
  }

  /**
   * `Just(x)` becomes `f(x)`; `Nothing` short-circuits without calling `f`.
   */
  bind<B>(this: Maybe<A>, f: (value: A) => Maybe<B>): Maybe<B> {
    return this.isJust() ? f(this.value) : nothing<B>();
  }

  orElse(this: Maybe<A>, defaultValue: A): A {
    return this.isJust() ? this.value : defaultValue;
  }

  match<B>(
    this: Maybe<A>,
    cases: { just: (value: A) => B; nothing: () => B },
  ): B {
    return this.isJust() ? cases.just(this.value) : cases.nothing();
  }
}

export class Just<A> extends MaybeBase<A> {
  readonly _tag = "Just";

  constructor(public readonly value: A) {
    super();
  }
}

export class Nothing<A = never> extends MaybeBase<A> {
  readonly _tag = "Nothing";
}

/**
 * @template A - Type of the value when present
 */
export type Maybe<A> = Just<A> | Nothing<A>;

export const just = <A,>(value: A): Maybe<A> => new Just(value);

export const nothing = <A = never,>(): Maybe<A> => new Nothing<A>();

/**
 * `null` and `undefined` become `Nothing`, anything else `Just`.
 *
 * @example
 * fromNullable(new Map([["a", 1]]).get("b")).orElse(0); // => 0
 */
export const fromNullable = <A,>(value: A | null | undefined): Maybe<A> =>
  value === null || value === undefined ? nothing<A>() : just(value);
