/**
 * Range Type
 *
 * Half-open (`range(1, 5)` → 1, 2, 3, 4) and closed
 * (`rangeInclusive(1, 5)` → 1, 2, 3, 4, 5) numeric ranges with a step.
 * Ranges are iterable, so every sequence combinator accepts them directly:
 *
 * ```ts
 * mapped(rangeInclusive(1, 8), squared); // [1, 4, 9, ..., 64]
 * ```
 */

export interface Range extends Iterable<number> {
  readonly start: number;
  readonly end: number;
  readonly step: number;
  readonly inclusive: boolean;
}

function makeRange(start: number, end: number, step: number, inclusive: boolean): Range {
  return {
    start,
    end,
    step,
    inclusive,
    [Symbol.iterator]() {
      return rangeIterator(this);
    },
  };
}

export function range(start: number, end: number, step: number = 1): Range {
  return makeRange(start, end, step, false);
}

export function rangeInclusive(start: number, end: number, step: number = 1): Range {
  return makeRange(start, end, step, true);
}

export function rangeBy(r: Range, step: number): Range {
  return makeRange(r.start, r.end, step, r.inclusive);
}

/**
 * The same elements in the opposite order.
 */
export function rangeReversed(r: Range): Range {
  const last = rangeLast(r);
  if (last === undefined) return makeRange(r.start, r.start, -r.step, false);
  return makeRange(last, r.start, -r.step, true);
}

// ============================================================================
// Iteration
// ============================================================================

type Bounds = Pick<Range, "start" | "end" | "step" | "inclusive">;

/**
 * Whether `value` lies between the start and the end in the direction of
 * the step.
 */
function withinBounds(r: Bounds, value: number): boolean {
  const { start, end, step, inclusive } = r;
  if (step > 0) return value >= start && (inclusive ? value <= end : value < end);
  if (step < 0) return value <= start && (inclusive ? value >= end : value > end);
  return false;
}

/**
 * Element `k` is `start + k * step`, so a fractional step does not
 * accumulate rounding error from one element to the next.
 */
function elementAt(r: Bounds, k: number): number {
  return r.start + k * r.step;
}

export function* rangeIterator(r: Bounds): Generator<number> {
  for (let k = 0; withinBounds(r, elementAt(r, k)); k++) yield elementAt(r, k);
}

export function rangeToArray(r: Range): number[] {
  return [...rangeIterator(r)];
}

// ============================================================================
// Queries
// ============================================================================

export function rangeContains(r: Range, value: number): boolean {
  if (!withinBounds(r, value)) return false;
  return elementAt(r, Math.round((value - r.start) / r.step)) === value;
}

export function rangeSize(r: Range): number {
  const { start, end, step } = r;
  if (step === 0 || !withinBounds(r, start)) return 0;
  const estimate = Math.floor((end - start) / step) + 1;
  if (!Number.isFinite(estimate)) return estimate;
  let size = estimate;
  while (size > 0 && !withinBounds(r, elementAt(r, size - 1))) size--;
  while (withinBounds(r, elementAt(r, size))) size++;
  return size;
}

export function rangeFirst(r: Range): number | undefined {
  const result = rangeIterator(r).next();
  return result.done ? undefined : result.value;
}

export function rangeLast(r: Range): number | undefined {
  const size = rangeSize(r);
  return size === 0 ? undefined : elementAt(r, size - 1);
}

export function rangeIsEmpty(r: Range): boolean {
  return rangeSize(r) === 0;
}

// ============================================================================
// Aggregate
// ============================================================================

export const RangeExt = {
  range,
  inclusive: rangeInclusive,
  by: rangeBy,
  reversed: rangeReversed,
  iterator: rangeIterator,
  toArray: rangeToArray,
  contains: rangeContains,
  size: rangeSize,
  first: rangeFirst,
  last: rangeLast,
  isEmpty: rangeIsEmpty,
} as const;
