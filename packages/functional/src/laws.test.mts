import { describe, expect, it } from "vitest";

import { arrow } from "./arrow.mjs";
import { left, right } from "./either.mjs";
import { fun } from "./fun.mjs";
import { identity } from "./identity.mjs";
import { just, nothing } from "./maybe.mjs";

import type { Either } from "./either.mjs";
import type { Maybe } from "./maybe.mjs";

/**
 * Algebraic law tests for the containers and composition wrappers.
 * Each law is checked on both variants where a type has more than one.
 */

describe("Algebraic Laws", () => {
  // generic identity function
  const id = <T,>(x: T): T => x;

  const f = (n: number) => n * 2;
  const g = (n: number) => n + 1;
  const h = (n: number) => n - 3;

  describe("Composition Laws", () => {
    it("fun: associativity", () => {
      const grouped1 = fun(f).compose(fun(g)).compose(fun(h));
      const grouped2 = fun(f).compose(fun(g).compose(fun(h)));

      for (const x of [-1, 0, 5]) {
        expect(grouped1.apply(x)).toBe(grouped2.apply(x));
      }
    });

    it("arrow: associativity", () => {
      const grouped1 = arrow(f).composeTo(arrow(g)).composeTo(arrow(h));
      const grouped2 = arrow(f).composeTo(arrow(g).composeTo(arrow(h)));

      for (const x of [-1, 0, 5]) {
        expect(grouped1.apply(x)).toBe(grouped2.apply(x));
      }
    });

    it("fun and arrow: identity on both sides", () => {
      expect(fun(id<number>).compose(fun(f)).apply(4)).toBe(f(4));
      expect(fun(f).compose(fun(id<number>)).apply(4)).toBe(f(4));
      expect(arrow(id<number>).composeTo(arrow(f)).apply(4)).toBe(f(4));
      expect(arrow(f).composeTo(arrow(id<number>)).apply(4)).toBe(f(4));
    });
  });

  describe("Identity Laws", () => {
    it("functor identity: map(id) ≅ id", () => {
      expect(identity(42).map(id).value).toBe(42);
    });

    it("functor composition: map(g∘f) ≅ map(g)∘map(f)", () => {
      expect(identity(10).map((x) => g(f(x))).value).toBe(
        identity(10).map(f).map(g).value,
      );
    });

    it("fmap associativity", () => {
      const grouped1 = identity(f).fmap(identity(g)).fmap(identity(h));
      const grouped2 = identity(f).fmap(identity(g).fmap(identity(h)));

      expect(grouped1.apply(7)).toBe(grouped2.apply(7));
    });
  });

  describe("Maybe Laws", () => {
    const safeHalf = (n: number): Maybe<number> =>
      n % 2 === 0 ? just(n / 2) : nothing();
    const positive = (n: number): Maybe<number> =>
      n > 0 ? just(n) : nothing();

    describe("Functor Laws", () => {
      it("identity: fmap(id) ≅ id", () => {
        expect(just(42).fmap(id)).toStrictEqual(just(42));
        expect(nothing<number>().fmap(id)).toStrictEqual(nothing());
      });

      it("composition: fmap(g∘f) ≅ fmap(g)∘fmap(f)", () => {
        expect(just(10).fmap((x) => g(f(x)))).toStrictEqual(
          just(10).fmap(f).fmap(g),
        );
      });
    });

    describe("Monad Laws", () => {
      it("left identity: bind(f)(just(x)) ≅ f(x)", () => {
        expect(just(8).bind(safeHalf)).toStrictEqual(safeHalf(8));
        expect(just(7).bind(safeHalf)).toStrictEqual(safeHalf(7));
      });

      it("right identity: m.bind(just) ≅ m", () => {
        expect(just(3).bind(just)).toStrictEqual(just(3));
        expect(nothing<number>().bind(just)).toStrictEqual(nothing());
      });

      it("associativity: m.bind(f).bind(g) ≅ m.bind(x => f(x).bind(g))", () => {
        for (const m of [just(8), just(6), just(-4), nothing<number>()]) {
          expect(m.bind(safeHalf).bind(positive)).toStrictEqual(
            m.bind((x) => safeHalf(x).bind(positive)),
          );
        }
      });
    });
  });

  describe("Either Laws", () => {
    const safeHalf = (n: number): Either<string, number> =>
      n % 2 === 0 ? right(n / 2) : left(`odd: ${n}`);
    const positive = (n: number): Either<string, number> =>
      n > 0 ? right(n) : left(`not positive: ${n}`);

    describe("Functor Laws", () => {
      it("identity: fmap(id) ≅ id", () => {
        expect(right(42).fmap(id)).toStrictEqual(right(42));
        expect(left("error").fmap(id)).toStrictEqual(left("error"));
      });

      it("composition: fmap(g∘f) ≅ fmap(g)∘fmap(f)", () => {
        expect(right(10).fmap((x) => g(f(x)))).toStrictEqual(
          right(10).fmap(f).fmap(g),
        );
      });
    });

    describe("Monad Laws", () => {
      it("left identity: bind(f)(right(x)) ≅ f(x)", () => {
        expect(right(8).bind(safeHalf)).toStrictEqual(safeHalf(8));
        expect(right(7).bind(safeHalf)).toStrictEqual(safeHalf(7));
      });

      it("right identity: m.bind(right) ≅ m", () => {
        expect(right(3).bind(right)).toStrictEqual(right(3));
        expect(left("error").bind(right)).toStrictEqual(left("error"));
      });

      it("associativity: m.bind(f).bind(g) ≅ m.bind(x => f(x).bind(g))", () => {
        const cases: Either<string, number>[] = [
          right(8),
          right(6),
          right(-4),
          left("start"),
        ];
        for (const m of cases) {
          expect(m.bind(safeHalf).bind(positive)).toStrictEqual(
            m.bind((x) => safeHalf(x).bind(positive)),
          );
        }
      });
    });
  });
});
