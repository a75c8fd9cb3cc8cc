import { describe, it, expect, afterEach, vi } from "vitest";
import { config, UnexpectedEmptyError } from "@terse/core";
import {
  coalesce,
  unwrap,
  isNone,
  isSome,
  optionalize,
  compact,
  mapped,
  compactMapped,
  filtered,
  reduced,
  sortedBy,
  ascending,
  defaultNumber,
  defaultArray,
  type Defaultable,
} from "../src/index.js";

const parseIntOrUndefined = (s: string): number | undefined => {
  const n = Number.parseInt(s, 10);
  return Number.isNaN(n) ? undefined : n;
};

describe("optionals", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  describe("coalesce", () => {
    it("returns a present value", () => {
      expect(coalesce(parseIntOrUndefined("100"), defaultNumber)).toBe(100);
      expect(coalesce(5, "number")).toBe(5);
    });

    it("substitutes the type's default for an absent value", () => {
      expect(coalesce(parseIntOrUndefined("invalid-input"), defaultNumber)).toBe(0);
      expect(coalesce(null, "string")).toBe("");
      expect(coalesce(undefined, "Array")).toEqual([]);
    });

    it("keeps present falsy values", () => {
      expect(coalesce(0, "number")).toBe(0);
      expect(coalesce("", "string")).toBe("");
      expect(coalesce(false, "boolean")).toBe(false);
    });

    it("only builds the default when it is needed", () => {
      const instance: Defaultable<number[]> = { defaultValue: vi.fn(() => []) };
      coalesce([1], instance);
      expect(instance.defaultValue).not.toHaveBeenCalled();
      coalesce(undefined, instance);
      expect(instance.defaultValue).toHaveBeenCalledTimes(1);
    });

    it("returns a fresh default each time", () => {
      const first = coalesce(undefined, defaultArray<number>());
      first.push(1);
      expect(coalesce(undefined, defaultArray<number>())).toEqual([]);
    });

    it("logs the substitution when debug is on", () => {
      const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
      config.set({ debug: true });
      coalesce(undefined, "number");
      expect(spy).toHaveBeenCalledWith("[terse:optional] coalesced undefined to a default value");
    });
  });

  describe("unwrap", () => {
    it("returns a present value", () => {
      expect(unwrap(7)).toBe(7);
      expect(unwrap(0)).toBe(0);
    });

    it("throws UnexpectedEmptyError for undefined and null", () => {
      expect(() => unwrap(undefined)).toThrow(UnexpectedEmptyError);
      expect(() => unwrap(null)).toThrow(
        "Unexpectedly found an empty value while unwrapping"
      );
    });

    it("uses a custom message", () => {
      expect(() => unwrap(undefined, "user id missing")).toThrow("user id missing");
    });
  });

  describe("isNone / isSome", () => {
    it("distinguishes absent from present", () => {
      expect(isNone(null)).toBe(true);
      expect(isNone(undefined)).toBe(true);
      expect(isNone(0)).toBe(false);
      expect(isSome("")).toBe(true);
      expect(isSome(undefined)).toBe(false);
    });
  });

  describe("optionalize", () => {
    it("passes absent inputs through as undefined", () => {
      const increment = optionalize((n: number) => n + 1);
      expect(increment(1)).toBe(2);
      expect(increment(null)).toBeUndefined();
      expect(increment(undefined)).toBeUndefined();
    });
  });

  describe("compact", () => {
    it("removes absent elements and keeps order", () => {
      expect(compact([1, 2, null, 3, 2, undefined, null, 1])).toEqual([1, 2, 3, 2, 1]);
    });
  });

  describe("with sequence combinators", () => {
    const arrayWithNils = [1, 2, null, 3, 2, null, null, 1];

    it("maps to absence flags", () => {
      expect(mapped(arrayWithNils, isNone)).toEqual([
        false,
        false,
        true,
        false,
        false,
        true,
        true,
        false,
      ]);
    });

    it("compact-maps through an optionalized function", () => {
      expect(compactMapped(arrayWithNils, optionalize((n: number) => n + 1))).toEqual([
        2, 3, 4, 3, 2,
      ]);
    });

    it("reduces the compacted values from a starting value", () => {
      expect(reduced(compact(arrayWithNils), 3, (a, b) => a + b)).toBe(12);
    });

    it("filters with coalesced values", () => {
      expect(filtered(arrayWithNils, (n) => coalesce(n, defaultNumber) > 1)).toEqual([2, 3, 2]);
    });

    it("sorts the compacted values", () => {
      expect(sortedBy(compact(arrayWithNils), ascending)).toEqual([1, 1, 2, 2, 3]);
    });
  });
});
