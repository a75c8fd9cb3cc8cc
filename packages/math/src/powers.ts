/**
 * Powers & absolute value
 */

/**
 * `base` raised to an arbitrary real `exponent`. A negative base with a
 * non-integer exponent yields NaN.
 */
export function power(base: number, exponent: number): number {
  return base ** exponent;
}

export function squared(n: number): number {
  return n * n;
}

export function cubed(n: number): number {
  return n * n * n;
}

export function abs(n: number): number {
  return Math.abs(n);
}
