import { describe, it, expect } from "vitest";
import { valueOr, isNumber, isString, isBoolean } from "../src/index.js";

describe("valueOr", () => {
  const settings: Record<string, unknown> = { retries: 3, name: "jobs", verbose: false };

  it("returns a value of the expected type", () => {
    expect(valueOr(settings, "retries", isNumber, () => 1)).toBe(3);
    expect(valueOr(settings, "name", isString, () => "default")).toBe("jobs");
    expect(valueOr(settings, "verbose", isBoolean, () => true)).toBe(false);
  });

  it("falls back when the value has another type", () => {
    expect(valueOr(settings, "name", isNumber, () => 1)).toBe(1);
  });

  it("falls back when the key is missing", () => {
    expect(valueOr(settings, "timeout", isNumber, () => 30)).toBe(30);
  });

  it("ignores inherited properties", () => {
    expect(valueOr(settings, "toString", isString, () => "none")).toBe("none");
  });

  it("works with maps and non-string keys", () => {
    const byId = new Map<number, unknown>([[1, "one"], [2, 2]]);
    expect(valueOr(byId, 1, isString, () => "?")).toBe("one");
    expect(valueOr(byId, 2, isString, () => "?")).toBe("?");
    expect(valueOr(byId, 3, isString, () => "?")).toBe("?");
  });
});
