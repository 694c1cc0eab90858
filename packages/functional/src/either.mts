/**
 * @module either
 * @description Either: a computation that succeeded with a value (`Right`) or
 * failed with an error (`Left`). `bind` stops at the first `Left`, so a chain
 * always reports the earliest failure.
 *
 * @example
 * ```typescript
 * import { left, right } from './either.mjs';
 *
 * const parseAge = (raw: string) => {
 *   const n = Number(raw);
 *   return Number.isNaN(n) ? left(`not a number: ${raw}`) : right(n);
 * };
 * const checkAdult = (n: number) => (n >= 18 ? right(n) : left('too young'));
 *
 * right('42').bind(parseAge).bind(checkAdult).orElse(0); // => 42
 * right('abc').bind(parseAge).bind(checkAdult); // => Left('not a number: abc')
 * ```
 *
 * @category Containers
 * @since 2026-10-18
 */

/**
 * @template E - Type of the error on the failure branch
 * @template A - Type of the value on the success branch
 */
abstract class EitherBase<E, A> {
  abstract readonly _tag: "Right" | "Left";

  isRight(): this is Right<E, A> {
    return this._tag === "Right";
  }

  isLeft(): this is Left<E, A> {
    return this._tag === "Left";
  }

  /**
   * Maps the success value; a `Left` is passed through with the same error.
   */
  fmap<B>(this: Either<E, A>, f: (value: A) => B): Either<E, B> {
    return this.isRight() ? right(f(this.value)) : left(this.error);
  }

  /**
   * Chains a step that may fail. On a `Left`, `f` is never called and the
   * existing error is kept.
   */
  bind<B, E2 = E>(
    this: Either<E, A>,
    f: (value: A) => Either<E2, B>,
  ): Either<E | E2, B> {
    return this.isRight() ? f(this.value) : left(this.error);
  }

  /**
   * Maps the error; a `Right` is passed through unchanged.
   */
  mapLeft<E2>(this: Either<E, A>, f: (error: E) => E2): Either<E2, A> {
    return this.isRight() ? right(this.value) : left(f(this.error));
  }

  orElse(this: Either<E, A>, defaultValue: A): A {
    return this.isRight() ? this.value : defaultValue;
  }

  match<B>(
    this: Either<E, A>,
    cases: { right: (value: A) => B; left: (error: E) => B },
  ): B {
    return this.isRight() ? cases.right(this.value) : cases.left(this.error);
  }
}

export class Right<E, A> extends EitherBase<E, A> {
  readonly _tag = "Right";

  constructor(public readonly value: A) {
    super();
  }
}

export class Left<E, A> extends EitherBase<E, A> {
  readonly _tag = "Left";

  constructor(public readonly error: E) {
    super();
  }
}

export type Either<E, A> = Right<E, A> | Left<E, A>;

export const right = <A, E = never>(value: A): Either<E, A> =>
  new Right<E, A>(value);

export const left = <E, A = never>(error: E): Either<E, A> =>
  new Left<E, A>(error);

/**
 * Runs `thunk` and captures a thrown error as a `Left`.
 * @description Without `onError`, non-`Error` throws are wrapped in an `Error`.
 *
 * @example
 * tryCatch(() => JSON.parse('{"a":1}') as unknown); // => Right({ a: 1 })
 * tryCatch(() => JSON.parse('oops') as unknown).isLeft(); // => true
 *
 * @example
 * tryCatch(
 *   () => JSON.parse('oops') as unknown,
 *   () => 'invalid json',
 * ); // => Left('invalid json')
 */
export function tryCatch<A>(thunk: () => A): Either<Error, A>;
export function tryCatch<A, E>(
  thunk: () => A,
  onError: (error: unknown) => E,
): Either<E, A>;
export function tryCatch<A, E>(
  thunk: () => A,
  onError?: (error: unknown) => E,
): Either<E | Error, A> {
  try {
    return right(thunk());
  } catch (error) {
    if (onError) {
      return left(onError(error));
    }
    return left(error instanceof Error ? error : new Error(String(error)));
  }
}
