import { describe, expect, it, vi } from "vitest";

import { Left, Right, left, right, tryCatch } from "./either.mjs";

import type { Either } from "./either.mjs";

const parseAge = (raw: string): Either<string, number> => {
  const n = Number(raw);
  return Number.isNaN(n) ? left(`not a number: ${raw}`) : right(n);
};

const checkAdult = (n: number): Either<string, number> =>
  n >= 18 ? right(n) : left("too young");

describe("constructors", () => {
  it("right holds a value", () => {
    const e = right(1);

    expect(e).toBeInstanceOf(Right);
    expect(e.isRight()).toBe(true);
    expect(e.isLeft()).toBe(false);
    expect(e.isRight() && e.value).toBe(1);
  });

  it("left holds an error", () => {
    const e = left("bad");

    expect(e).toBeInstanceOf(Left);
    expect(e.isLeft()).toBe(true);
    expect(e.isLeft() && e.error).toBe("bad");
  });
});

describe("fmap", () => {
  it("maps a Right", () => {
    expect(right(2).fmap((x) => x + 1)).toStrictEqual(right(3));
  });

  it("passes a Left through with the same error", () => {
    const f = vi.fn((x: number) => x + 1);

    expect(left<string, number>("bad").fmap(f)).toStrictEqual(left("bad"));
    expect(f).not.toHaveBeenCalled();
  });
});

describe("bind", () => {
  it("chains steps that succeed", () => {
    expect(right("42").bind(parseAge).bind(checkAdult).orElse(0)).toBe(42);
  });

  it("reports the failing step's error", () => {
    expect(right("abc").bind(parseAge).bind(checkAdult)).toStrictEqual(
      left("not a number: abc"),
    );
    expect(right("12").bind(parseAge).bind(checkAdult)).toStrictEqual(
      left("too young"),
    );
  });

  it("keeps the first error and skips later steps", () => {
    const third = vi.fn(() => right(0));
    const result = right(10)
      .bind(() => left("first"))
      .bind(() => left("second"))
      .bind(third);

    expect(result).toStrictEqual(left("first"));
    expect(third).not.toHaveBeenCalled();
  });
});

describe("mapLeft", () => {
  it("maps the error of a Left", () => {
    expect(left("bad").mapLeft((e) => e.toUpperCase())).toStrictEqual(
      left("BAD"),
    );
  });

  it("passes a Right through", () => {
    expect(right(1).mapLeft(() => "never")).toStrictEqual(right(1));
  });
});

describe("orElse and match", () => {
  it("orElse returns the value or the default", () => {
    expect(right<number, string>(7).orElse(0)).toBe(7);
    expect(left<string, number>("bad").orElse(0)).toBe(0);
  });

  it("match calls the branch for the variant", () => {
    const render = (e: Either<string, number>) =>
      e.match({ right: (n) => `ok ${n}`, left: (err) => `error: ${err}` });

    expect(render(right(1))).toBe("ok 1");
    expect(render(left("bad"))).toBe("error: bad");
  });
});

describe("tryCatch", () => {
  it("returns a Right when the thunk succeeds", () => {
    expect(tryCatch((): unknown => JSON.parse('{"a":1}'))).toStrictEqual(
      right({ a: 1 }),
    );
  });

  it("captures a thrown Error as a Left", () => {
    const error = new Error("boom");
    const result = tryCatch(() => {
      throw error;
    });

    expect(result.isLeft() && result.error).toBe(error);
  });

  it("wraps non-Error throws in an Error", () => {
    const result = tryCatch(() => {
      // eslint-disable-next-line @typescript-eslint/only-throw-error
      throw "nope";
    });

    expect(result.match({ right: () => "", left: (e) => e.message })).toBe(
      "nope",
    );
  });

  it("uses onError to build the Left", () => {
    const result = tryCatch(
      (): unknown => JSON.parse("oops"),
      () => "invalid json",
    );

    expect(result).toStrictEqual(left("invalid json"));
  });
});
