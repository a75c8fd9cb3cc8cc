/**
 * Defaultable — Rust Default
 *
 * Types with a sensible default value, used to coalesce absent values:
 *
 * ```ts
 * const scores = new Map([["ada", 12]]);
 * coalesce(scores.get("ada"), defaultNumber); // 12
 * coalesce(scores.get("bob"), "number");      // 0
 * ```
 *
 * Instances for mutable types build a fresh value on every call.
 */

import { config } from "@terse/core";
import { range, type Range } from "../data/range.js";
import { epoch, referenceDate } from "../extensions/date.js";

export interface Defaultable<A> {
  defaultValue(): A;
}

export const defaultNumber: Defaultable<number> = {
  defaultValue: () => 0,
};

export const defaultString: Defaultable<string> = {
  defaultValue: () => "",
};

export const defaultBoolean: Defaultable<boolean> = {
  defaultValue: () => false,
};

export const defaultBigInt: Defaultable<bigint> = {
  defaultValue: () => 0n,
};

export function defaultArray<A>(): Defaultable<A[]> {
  return { defaultValue: () => [] };
}

export function defaultMap<K, V>(): Defaultable<Map<K, V>> {
  return { defaultValue: () => new Map() };
}

export function defaultSet<A>(): Defaultable<Set<A>> {
  return { defaultValue: () => new Set() };
}

export function defaultRecord<V>(): Defaultable<Record<string, V>> {
  return { defaultValue: () => ({}) };
}

export const defaultBytes: Defaultable<Uint8Array> = {
  defaultValue: () => new Uint8Array(0),
};

/**
 * The epoch, or the reference date when `defaults.date` is `"reference"`.
 */
export const defaultDate: Defaultable<Date> = {
  defaultValue: () => (config.get("defaults.date") === "reference" ? referenceDate() : epoch()),
};

/** An empty range starting at zero. */
export const defaultRange: Defaultable<Range> = {
  defaultValue: () => range(0, 0),
};

// ============================================================================
// Lookup by type name
// ============================================================================

/**
 * Built-in types with a registered default, keyed by name.
 */
export interface DefaultableTypes {
  number: number;
  string: string;
  boolean: boolean;
  bigint: bigint;
  Array: unknown[];
  Map: Map<unknown, unknown>;
  Set: Set<unknown>;
  Record: Record<string, unknown>;
  Uint8Array: Uint8Array;
  Date: Date;
  Range: Range;
}

export type DefaultableType = keyof DefaultableTypes;

export const defaultInstances: { readonly [K in DefaultableType]: Defaultable<DefaultableTypes[K]> } =
  {
    number: defaultNumber,
    string: defaultString,
    boolean: defaultBoolean,
    bigint: defaultBigInt,
    Array: defaultArray(),
    Map: defaultMap(),
    Set: defaultSet(),
    Record: defaultRecord(),
    Uint8Array: defaultBytes,
    Date: defaultDate,
    Range: defaultRange,
  };

export function defaultValueOf<K extends DefaultableType>(type: K): DefaultableTypes[K] {
  const instance: Defaultable<DefaultableTypes[K]> = defaultInstances[type];
  return instance.defaultValue();
}

