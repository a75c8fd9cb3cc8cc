/**
 * Date Extension Methods
 *
 * Two fixed instants and conversions between dates and seconds since the
 * Unix epoch. Intervals are in seconds, as floating-point numbers.
 */

/** Seconds from 1970-01-01T00:00:00Z to 2001-01-01T00:00:00Z. */
export const TIME_INTERVAL_BETWEEN_EPOCH_AND_REFERENCE_DATE = 978_307_200;

/**
 * 1970-01-01T00:00:00Z. A new `Date` on every call.
 */
export function epoch(): Date {
  return new Date(0);
}

/**
 * 2001-01-01T00:00:00Z. A new `Date` on every call.
 */
export function referenceDate(): Date {
  return new Date(TIME_INTERVAL_BETWEEN_EPOCH_AND_REFERENCE_DATE * 1000);
}

export function timeIntervalSinceEpoch(date: Date = new Date()): number {
  return date.getTime() / 1000;
}

export function timeIntervalSinceReferenceDate(date: Date = new Date()): number {
  return timeIntervalSinceEpoch(date) - TIME_INTERVAL_BETWEEN_EPOCH_AND_REFERENCE_DATE;
}

export function dateFromTimeIntervalSinceEpoch(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function dateFromTimeIntervalSinceReferenceDate(seconds: number): Date {
  return dateFromTimeIntervalSinceEpoch(seconds + TIME_INTERVAL_BETWEEN_EPOCH_AND_REFERENCE_DATE);
}

// ============================================================================
// Aggregate
// ============================================================================

export const DateExt = {
  epoch,
  referenceDate,
  timeIntervalSinceEpoch,
  timeIntervalSinceReferenceDate,
  fromTimeIntervalSinceEpoch: dateFromTimeIntervalSinceEpoch,
  fromTimeIntervalSinceReferenceDate: dateFromTimeIntervalSinceReferenceDate,
} as const;
