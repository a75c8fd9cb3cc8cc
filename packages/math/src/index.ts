/**
 * @terse/math — Numeric Helpers
 *
 * This package provides:
 * - **Roots**: `root(x, n)` for any real degree, with real roots of
 *   negative numbers for odd degrees
 * - **Powers**: power, squared, cubed, abs
 * - **Predicates**: signs, zero, parity and IEEE classification
 * - **Arithmetic**: percent, divide, multiply, remainder, comparisons
 * - **Constants**: π, e and common fractions
 *
 * Domain errors surface as NaN; only `checkedRoot` and `parity` throw.
 *
 * @example
 * ```typescript
 * import { root, cubeRoot, percent, isOdd } from "@terse/math";
 *
 * root(-243, 5); // -3
 * cubeRoot(8);   // 2
 * percent(75);   // 0.75
 * isOdd(-5);     // true
 * ```
 *
 * @packageDocumentation
 */

import { RootExt } from "./roots.js";
import { power, squared, cubed, abs } from "./powers.js";
import {
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
  isNotNormal,
  isSubnormal,
  isNotSubnormal,
} from "./predicates.js";
import {
  percent,
  divide,
  multiply,
  remainder,
  isAtLeast,
  isAtMost,
  approxEqual,
} from "./arithmetic.js";

// ============================================================================
// Roots
// ============================================================================

export { root, squareRoot, cubeRoot, fourthRoot, checkedRoot, RootExt } from "./roots.js";

// ============================================================================
// Powers
// ============================================================================

export { power, squared, cubed, abs } from "./powers.js";

// ============================================================================
// Predicates
// ============================================================================

export {
  type Parity,
  MIN_NORMAL,
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
  isNotNormal,
  isSubnormal,
  isNotSubnormal,
  isDenormal,
  isNotDenormal,
  isDenormalized,
  isNotDenormalized,
  isNormalized,
  isNotNormalized,
} from "./predicates.js";

// ============================================================================
// Arithmetic
// ============================================================================

export {
  type Ordered,
  percent,
  divide,
  multiply,
  remainder,
  isAtLeast,
  isAtMost,
  approxEqual,
} from "./arithmetic.js";

// ============================================================================
// Constants
// ============================================================================

export * from "./constants.js";

// ============================================================================
// Aggregate
// ============================================================================

export const NumberExt = {
  ...RootExt,
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
  isNotNormal,
  isSubnormal,
  isNotSubnormal,
  percent,
  divide,
  multiply,
  remainder,
  isAtLeast,
  isAtMost,
  approxEqual,
} as const;
