/**
 * Sequence Combinators
 *
 * Named forms of map, compact-map, filter, reduce, for-each and sort that
 * take any `Iterable` (arrays, sets, map entries, ranges, generators) and
 * return a newly allocated array. Traversal is always left to right.
 *
 * ```ts
 * const squares = mapped([1, 2, 3, 4], (n) => n * n);     // [1, 4, 9, 16]
 * reducedWithDefault(squares, defaultNumber, (a, b) => a + b); // 30
 * sortedBy([3, 1, 2], descending);                          // [3, 2, 1]
 * ```
 */

import type { Defaultable } from "../typeclasses/defaultable.js";

// ============================================================================
// Mapping
// ============================================================================

export function mapped<A, B>(seq: Iterable<A>, transform: (a: A) => B): B[] {
  const result: B[] = [];
  for (const x of seq) result.push(transform(x));
  return result;
}

/**
 * Maps and keeps only the results that are neither `null` nor `undefined`.
 */
export function compactMapped<A, B>(
  seq: Iterable<A>,
  transform: (a: A) => B | null | undefined
): B[] {
  const result: B[] = [];
  for (const x of seq) {
    const y = transform(x);
    if (y !== null && y !== undefined) result.push(y);
  }
  return result;
}

// ============================================================================
// Filtering
// ============================================================================

export function filtered<A, B extends A>(seq: Iterable<A>, isIncluded: (a: A) => a is B): B[];
export function filtered<A>(seq: Iterable<A>, isIncluded: (a: A) => boolean): A[];
export function filtered<A>(seq: Iterable<A>, isIncluded: (a: A) => boolean): A[] {
  const result: A[] = [];
  for (const x of seq) {
    if (isIncluded(x)) result.push(x);
  }
  return result;
}

// ============================================================================
// Reducing
// ============================================================================

export function reduced<A, R>(
  seq: Iterable<A>,
  initialResult: R,
  nextPartialResult: (acc: R, a: A) => R
): R {
  let acc = initialResult;
  for (const x of seq) acc = nextPartialResult(acc, x);
  return acc;
}

/**
 * Reduces starting from the result type's default value; an empty
 * sequence yields that default.
 */
export function reducedWithDefault<A, R>(
  seq: Iterable<A>,
  instance: Defaultable<R>,
  nextPartialResult: (acc: R, a: A) => R
): R {
  return reduced(seq, instance.defaultValue(), nextPartialResult);
}

// ============================================================================
// Iteration
// ============================================================================

/**
 * Calls `body` with each element and its position. Unlike a `for..of`
 * loop there is no `break`; returning from `body` only ends that call.
 */
export function forEach<A>(seq: Iterable<A>, body: (element: A, index: number) => void): void {
  let index = 0;
  for (const x of seq) body(x, index++);
}

/**
 * Calls `body` with 0, 1, ..., count - 1.
 */
export function times(count: number, body: (iteration: number) => void): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`cannot iterate ${count} times: count must be a non-negative integer`);
  }
  for (let i = 0; i < count; i++) body(i);
}

// ============================================================================
// Sorting
// ============================================================================

export type Comparable = number | string | bigint | Date;

export function ascending<A extends Comparable>(a: A, b: A): boolean {
  return a < b;
}

export function descending<A extends Comparable>(a: A, b: A): boolean {
  return a > b;
}

/**
 * Stable sort. `areInIncreasingOrder(a, b)` returns true when `a` belongs
 * before `b`; it must be a strict weak ordering. Elements it leaves
 * unordered keep their original relative order.
 */
export function sortedBy<A>(
  seq: Iterable<A>,
  areInIncreasingOrder: (a: A, b: A) => boolean
): A[] {
  return Array.from(seq).sort((a, b) => {
    if (areInIncreasingOrder(a, b)) return -1;
    if (areInIncreasingOrder(b, a)) return 1;
    return 0;
  });
}

// ============================================================================
// Aggregate
// ============================================================================

export const SequenceExt = {
  mapped,
  compactMapped,
  filtered,
  reduced,
  reducedWithDefault,
  forEach,
  times,
  sortedBy,
} as const;
