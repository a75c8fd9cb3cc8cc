/**
 * Named arithmetic and comparison operators.
 */

import { config } from "@terse/core";

/**
 * `n / 100`: `percent(21)` is 0.21.
 */
export function percent(n: number): number {
  return n / 100;
}

/**
 * IEEE division: a zero divisor gives an infinity signed like the
 * dividend, or NaN for 0 / 0.
 */
export function divide(dividend: number, divisor: number): number {
  return dividend / divisor;
}

export function multiply(a: number, b: number): number {
  return a * b;
}

/**
 * Remainder of truncating division. It has the sign of `dividend` and
 * `dividend === divisor * Math.trunc(dividend / divisor) + remainder`.
 */
export function remainder(dividend: number, divisor: number): number {
  return dividend % divisor;
}

export type Ordered = number | string | bigint | Date;

export function isAtLeast<A extends Ordered>(a: A, b: A): boolean {
  return a >= b;
}

export function isAtMost<A extends Ordered>(a: A, b: A): boolean {
  return a <= b;
}

/**
 * Whether `a` and `b` differ by at most `tolerance` (default: the
 * configured `math.tolerance`).
 */
export function approxEqual(a: number, b: number, tolerance?: number): boolean {
  if (a === b) return true;
  return Math.abs(a - b) <= (tolerance ?? config.get("math.tolerance"));
}
