/**
 * Numeric Predicates
 *
 * Sign, zero, parity and IEEE 754 classification checks, each with its
 * negated form so it can be passed straight to `filtered`:
 *
 * ```ts
 * filtered(readings, isNotNaN);
 * ```
 */

import { DomainError } from "@terse/core";

// ============================================================================
// Signs
// ============================================================================

export function isNegative(n: number): boolean {
  return n < 0;
}

export function isPositive(n: number): boolean {
  return n > 0;
}

export function isNotNegative(n: number): boolean {
  return !isNegative(n);
}

export function isNotPositive(n: number): boolean {
  return !isPositive(n);
}

/**
 * -1, 0 or 1. Negative zero counts as 0; NaN stays NaN.
 */
export function sign(n: number): number {
  if (Number.isNaN(n)) return NaN;
  return n > 0 ? 1 : n < 0 ? -1 : 0;
}

// ============================================================================
// Zero
// ============================================================================

export function isZero(n: number): boolean {
  return n === 0;
}

export function isNotZero(n: number): boolean {
  return !isZero(n);
}

// ============================================================================
// Parity
// ============================================================================

export type Parity = "even" | "odd";

/**
 * Whether an integer is evenly divisible by 2.
 */
export function parity(n: number): Parity {
  if (!Number.isInteger(n)) {
    throw new DomainError(`parity is only defined for integers, got ${n}`, "parity");
  }
  return n % 2 === 0 ? "even" : "odd";
}

// Non-integers are neither even nor odd.
export function isEven(n: number): boolean {
  return Number.isInteger(n) && parity(n) === "even";
}

export function isOdd(n: number): boolean {
  return Number.isInteger(n) && parity(n) === "odd";
}

export function isNotEven(n: number): boolean {
  return !isEven(n);
}

export function isNotOdd(n: number): boolean {
  return !isOdd(n);
}

// ============================================================================
// Floating-point classification
// ============================================================================

/** Smallest positive normal double, 2^-1022. */
export const MIN_NORMAL = 2.2250738585072014e-308;

export function isNotNaN(n: number): boolean {
  return !Number.isNaN(n);
}

export function isNotFinite(n: number): boolean {
  return !Number.isFinite(n);
}

export function isInfinite(n: number): boolean {
  return n === Infinity || n === -Infinity;
}

export function isNotInfinite(n: number): boolean {
  return !isInfinite(n);
}

/**
 * Finite, nonzero and at full precision. Zero is neither normal nor subnormal.
 */
export function isNormal(n: number): boolean {
  return Number.isFinite(n) && Math.abs(n) >= MIN_NORMAL;
}

export function isNotNormal(n: number): boolean {
  return !isNormal(n);
}

/**
 * Nonzero with a magnitude below the smallest normal number.
 */
export function isSubnormal(n: number): boolean {
  return n !== 0 && Math.abs(n) < MIN_NORMAL;
}

export function isNotSubnormal(n: number): boolean {
  return !isSubnormal(n);
}

// "Denormal" and "denormalized" are other names for subnormal.
export const isDenormal = isSubnormal;
export const isNotDenormal = isNotSubnormal;
export const isDenormalized = isSubnormal;
export const isNotDenormalized = isNotSubnormal;
export const isNormalized = isNormal;
export const isNotNormalized = isNotNormal;
