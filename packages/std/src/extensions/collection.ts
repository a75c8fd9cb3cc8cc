/**
 * Emptiness checks over the built-in containers.
 */

import { rangeIsEmpty, type Range } from "../data/range.js";

export type Container =
  | string
  | readonly unknown[]
  | ReadonlyMap<unknown, unknown>
  | ReadonlySet<unknown>
  | ArrayBufferView
  | Range
  | Readonly<Record<string, unknown>>;

function isRange(value: Container): value is Range {
  return (
    typeof value === "object" &&
    "start" in value &&
    "end" in value &&
    "step" in value &&
    "inclusive" in value &&
    Symbol.iterator in value
  );
}

export function isEmpty(value: Container): boolean {
  if (typeof value === "string" || Array.isArray(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;
  if (ArrayBuffer.isView(value)) return value.byteLength === 0;
  if (isRange(value)) return rangeIsEmpty(value);
  return Object.keys(value).length === 0;
}

export function isNotEmpty(value: Container): boolean {
  return !isEmpty(value);
}

export const CollectionExt = {
  isEmpty,
  isNotEmpty,
} as const;
