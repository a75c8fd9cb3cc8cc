/**
 * Optional Handling
 *
 * An optional value is `T | null | undefined`. Two policies apply:
 * `coalesce` substitutes the type's default, `unwrap` throws
 * `UnexpectedEmptyError`.
 */

import { debugLog, UnexpectedEmptyError } from "@terse/core";
import {
  defaultInstances,
  type Defaultable,
  type DefaultableType,
  type DefaultableTypes,
} from "../typeclasses/defaultable.js";

export type Optional<T> = T | null | undefined;

export function isNone<T>(value: Optional<T>): value is null | undefined {
  return value === null || value === undefined;
}

export function isSome<T>(value: Optional<T>): value is T {
  return !isNone(value);
}

/**
 * The value, or the default for its type when absent. The default is only
 * built when it is needed.
 */
export function coalesce<K extends DefaultableType>(
  value: Optional<DefaultableTypes[K]>,
  type: K
): DefaultableTypes[K];
export function coalesce<T>(value: Optional<T>, instance: Defaultable<T>): T;
export function coalesce<T>(value: Optional<T>, source: Defaultable<T> | DefaultableType): unknown {
  if (isSome(value)) return value;
  const instance: Defaultable<unknown> =
    typeof source === "string" ? defaultInstances[source] : source;
  debugLog("optional", `coalesced ${String(value)} to a default value`);
  return instance.defaultValue();
}

/**
 * The value, or an `UnexpectedEmptyError` when it is absent.
 */
export function unwrap<T>(value: Optional<T>, message?: string): T {
  if (isNone(value)) {
    debugLog("optional", `unwrapped ${String(value)}`);
    throw new UnexpectedEmptyError(message);
  }
  return value;
}

/**
 * Lifts a function so that absent inputs pass through as `undefined`.
 */
export function optionalize<A, B>(fn: (a: A) => B): (a: Optional<A>) => B | undefined {
  return (a) => (isNone(a) ? undefined : fn(a));
}

/**
 * The present elements, in order.
 */
export function compact<A>(seq: Iterable<Optional<A>>): A[] {
  const result: A[] = [];
  for (const x of seq) {
    if (isSome(x)) result.push(x);
  }
  return result;
}

// ============================================================================
// Aggregate
// ============================================================================

export const OptionalExt = {
  isNone,
  isSome,
  coalesce,
  unwrap,
  optionalize,
  compact,
} as const;
