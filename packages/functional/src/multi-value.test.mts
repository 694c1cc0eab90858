import { describe, expect, it } from "vitest";

import { MultiValue, isMultiValue, unpack, values } from "./multi-value.mjs";

describe("values", () => {
  it("packs its arguments in order", () => {
    const packed = values(1, "two", true);

    expect(packed).toBeInstanceOf(MultiValue);
    expect(packed.items).toEqual([1, "two", true]);
  });

  it("allows an empty pack", () => {
    expect(values().items).toEqual([]);
  });
});

describe("isMultiValue", () => {
  it("recognises packs only", () => {
    expect(isMultiValue(values(1, 2))).toBe(true);
    expect(isMultiValue([1, 2])).toBe(false);
    expect(isMultiValue({ _tag: "MultiValue", items: [1] })).toBe(false);
    expect(isMultiValue(undefined)).toBe(false);
  });
});

describe("unpack", () => {
  it("spreads a pack into an argument list", () => {
    expect(unpack(values(1, 2))).toEqual([1, 2]);
  });

  it("wraps anything else as a single argument", () => {
    expect(unpack(5)).toEqual([5]);
    expect(unpack([1, 2])).toEqual([[1, 2]]);
    expect(unpack(undefined)).toEqual([undefined]);
  });
});
