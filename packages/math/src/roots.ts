/**
 * Roots
 *
 * `root(x, n)` generalizes the square and cube roots to any real degree.
 * A negative radicand has a real root only for an odd integer degree; in
 * every other case the result is NaN, exactly as raising a negative
 * number to a fractional power would be. Nothing here throws except
 * `checkedRoot`.
 *
 * ```ts
 * root(243, 5);   // 3
 * root(-243, 5);  // -3
 * root(-64, 2);   // NaN
 * ```
 */

import { debugLog, DomainError } from "@terse/core";

function isOddInteger(n: number): boolean {
  return Math.abs(n % 2) === 1;
}

/**
 * For a positive integer degree, a result that rounds to an exact integer
 * root is returned as that integer, so perfect powers come out exact.
 */
function snapToExactRoot(magnitude: number, approx: number, degree: number): number {
  if (!Number.isInteger(degree) || degree <= 0 || !Number.isFinite(approx)) return approx;
  const candidate = Math.round(approx);
  return candidate ** degree === magnitude ? candidate : approx;
}

function principalRoot(magnitude: number, degree: number): number {
  const approx = degree === 3 ? Math.cbrt(magnitude) : Math.pow(magnitude, 1 / degree);
  return snapToExactRoot(magnitude, approx, degree);
}

/**
 * The principal root of `radicand` with the given degree.
 *
 * - `root(0, n)` is 0 for every nonzero `n`
 * - a zero or NaN degree yields NaN
 * - a negative radicand yields `-root(-radicand, n)` for odd integer `n`,
 *   and NaN otherwise
 */
export function root(radicand: number, degree: number): number {
  if (degree === 0 || Number.isNaN(degree)) return NaN;
  if (radicand === 0) return 0;
  if (degree === 2) return Math.sqrt(radicand);
  if (radicand < 0) {
    return isOddInteger(degree) ? -principalRoot(-radicand, degree) : NaN;
  }
  return principalRoot(radicand, degree);
}

export function squareRoot(x: number): number {
  return root(x, 2);
}

export function cubeRoot(x: number): number {
  return root(x, 3);
}

export function fourthRoot(x: number): number {
  return root(x, 4);
}

/**
 * Like `root`, but throws `DomainError` where `root` would produce NaN
 * from a radicand that is not itself NaN.
 */
export function checkedRoot(radicand: number, degree: number): number {
  const result = root(radicand, degree);
  if (Number.isNaN(result) && !Number.isNaN(radicand)) {
    const reason =
      degree === 0 || Number.isNaN(degree)
        ? `degree must be a nonzero number, got ${degree}`
        : `negative radicand ${radicand} has no real root of degree ${degree}`;
    debugLog("math", `checkedRoot rejected: ${reason}`);
    throw new DomainError(reason, "root");
  }
  return result;
}

// ============================================================================
// Aggregate
// ============================================================================

export const RootExt = {
  root,
  squareRoot,
  cubeRoot,
  fourthRoot,
  checkedRoot,
} as const;
