/**
 * Mathematical constants and common fractions.
 */

/** π, approximately 3.14159. A half-turn in radians. */
export const PI = Math.PI;

/** Euler's number, approximately 2.71828. */
export const E = Math.E;

export const HALF = 1 / 2;
export const THIRD = 1 / 3;
export const TWO_THIRDS = 2 / 3;
export const QUARTER = 1 / 4;
export const THREE_QUARTERS = 3 / 4;
export const FIFTH = 1 / 5;
export const TWO_FIFTHS = 2 / 5;
export const THREE_FIFTHS = 3 / 5;
export const FOUR_FIFTHS = 4 / 5;
export const SIXTH = 1 / 6;
export const FIVE_SIXTHS = 5 / 6;
export const EIGHTH = 1 / 8;
export const THREE_EIGHTHS = 3 / 8;
export const FIVE_EIGHTHS = 5 / 8;
export const SEVEN_EIGHTHS = 7 / 8;
