import { describe, it, expect, afterEach } from "vitest";
import { config, DomainError } from "@terse/core";
import {
  power,
  squared,
  cubed,
  abs,
  isNegative,
  isPositive,
  isNotNegative,
  isNotPositive,
  sign,
  isZero,
  isNotZero,
  parity,
  isEven,
  isOdd,
  isNotEven,
  isNotOdd,
  isNotNaN,
  isNotFinite,
  isInfinite,
  isNotInfinite,
  isNormal,
  isSubnormal,
  isDenormal,
  isNormalized,
  MIN_NORMAL,
  percent,
  divide,
  multiply,
  remainder,
  isAtLeast,
  isAtMost,
  approxEqual,
  PI,
  E,
  HALF,
  THIRD,
  TWO_THIRDS,
  THREE_QUARTERS,
  SEVEN_EIGHTHS,
  NumberExt,
} from "../src/index.js";

describe("powers", () => {
  it("power", () => {
    expect(power(3, 4)).toBe(81);
    expect(power(2, -1)).toBe(0.5);
    expect(power(-8, 1 / 3)).toBeNaN();
  });

  it("squared and cubed", () => {
    expect(squared(4)).toBe(16);
    expect(cubed(4)).toBe(64);
    expect(cubed(-2)).toBe(-8);
  });

  it("abs", () => {
    expect(abs(-42)).toBe(42);
    expect(abs(42)).toBe(42);
  });
});

describe("signs", () => {
  it("negative and positive", () => {
    expect(isNegative(-5)).toBe(true);
    expect(isPositive(-5)).toBe(false);
    expect(isNotNegative(0)).toBe(true);
    expect(isNotPositive(0)).toBe(true);
  });

  it("sign", () => {
    expect(sign(-3.5)).toBe(-1);
    expect(sign(0)).toBe(0);
    expect(sign(-0)).toBe(0);
    expect(sign(7)).toBe(1);
    expect(sign(NaN)).toBeNaN();
  });

  it("zero", () => {
    expect(isZero(0)).toBe(true);
    expect(isZero(-0)).toBe(true);
    expect(isNotZero(1e-300)).toBe(true);
  });
});

describe("parity", () => {
  it("classifies integers", () => {
    expect(parity(0)).toBe("even");
    expect(parity(-4)).toBe("even");
    expect(parity(-3)).toBe("odd");
    expect(parity(7)).toBe("odd");
  });

  it("throws for non-integers", () => {
    expect(() => parity(2.5)).toThrow(DomainError);
    expect(() => parity(NaN)).toThrow("parity is only defined for integers, got NaN");
  });

  it("predicates", () => {
    expect(isEven(10)).toBe(true);
    expect(isOdd(-5)).toBe(true);
    expect(isNotEven(3)).toBe(true);
    expect(isNotOdd(4)).toBe(true);
  });

  it("a non-integer is neither even nor odd", () => {
    expect(isEven(2.5)).toBe(false);
    expect(isOdd(2.5)).toBe(false);
    expect(isNotEven(2.5)).toBe(true);
    expect(isNotOdd(2.5)).toBe(true);
  });
});

describe("floating-point classification", () => {
  it("NaN and infinities", () => {
    expect(isNotNaN(NaN)).toBe(false);
    expect(isNotNaN(1)).toBe(true);
    expect(isInfinite(-Infinity)).toBe(true);
    expect(isNotInfinite(NaN)).toBe(true);
    expect(isNotFinite(NaN)).toBe(true);
    expect(isNotFinite(1)).toBe(false);
  });

  it("normal and subnormal", () => {
    expect(isNormal(1)).toBe(true);
    expect(isNormal(MIN_NORMAL)).toBe(true);
    expect(isNormal(0)).toBe(false);
    expect(isSubnormal(0)).toBe(false);
    expect(isSubnormal(Number.MIN_VALUE)).toBe(true);
    expect(isSubnormal(MIN_NORMAL / 2)).toBe(true);
    expect(isNormal(Infinity)).toBe(false);
  });

  it("aliases", () => {
    expect(isDenormal).toBe(isSubnormal);
    expect(isNormalized).toBe(isNormal);
  });
});

describe("arithmetic", () => {
  afterEach(() => {
    config.reset();
  });

  it("percent", () => {
    expect(percent(75)).toBe(0.75);
    expect(percent(21)).toBe(0.21);
  });

  it("divide and multiply", () => {
    expect(divide(3, 4)).toBe(0.75);
    expect(divide(16, 0)).toBe(Infinity);
    expect(divide(-16, 0)).toBe(-Infinity);
    expect(multiply(3, 4)).toBe(12);
  });

  it("remainder truncates and keeps the dividend's sign", () => {
    expect(remainder(8.625, 0.75)).toBe(0.375);
    expect(remainder(-7, 3)).toBe(-1);
  });

  it("comparisons", () => {
    expect(isAtLeast(3, 3)).toBe(true);
    expect(isAtMost(2, 3)).toBe(true);
    expect(isAtLeast("a", "b")).toBe(false);
    expect(isAtMost(new Date(0), new Date(1))).toBe(true);
  });

  it("approxEqual uses the configured tolerance", () => {
    expect(approxEqual(0.1 + 0.2, 0.3)).toBe(true);
    expect(approxEqual(1, 1.001)).toBe(false);
    config.set({ math: { tolerance: 0.01 } });
    expect(approxEqual(1, 1.001)).toBe(true);
  });

  it("approxEqual takes an explicit tolerance", () => {
    expect(approxEqual(10, 10.4, 0.5)).toBe(true);
    expect(approxEqual(Infinity, Infinity)).toBe(true);
  });
});

describe("constants", () => {
  it("match the platform values", () => {
    expect(PI).toBe(Math.PI);
    expect(E).toBe(Math.E);
  });

  it("fractions equal their quotients", () => {
    expect(HALF).toBe(0.5);
    expect(THIRD).toBe(1 / 3);
    expect(TWO_THIRDS).toBe(2 / 3);
    expect(THREE_QUARTERS).toBe(0.75);
    expect(SEVEN_EIGHTHS).toBe(0.875);
  });
});

it("NumberExt gathers the helpers", () => {
  expect(NumberExt.root(-27, 3)).toBe(-3);
  expect(NumberExt.percent(50)).toBe(0.5);
  expect(NumberExt.isOdd(3)).toBe(true);
});
