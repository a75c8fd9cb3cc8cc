/**
 * Dictionary lookups with a typed fallback.
 */

export type Dictionary<K, V> = ReadonlyMap<K, V> | Readonly<Record<string, V>>;

/**
 * The value stored under `key` when it passes `guard`; otherwise
 * `fallback()`. A missing key and a value of the wrong type are treated
 * the same way.
 *
 * ```ts
 * const settings: Record<string, unknown> = { retries: 3, name: "jobs" };
 * valueOr(settings, "retries", isNumber, () => 1); // 3
 * valueOr(settings, "name", isNumber, () => 1);    // 1
 * ```
 */
export function valueOr<T>(
  source: Dictionary<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  fallback: () => T
): T;
export function valueOr<K, T>(
  source: ReadonlyMap<K, unknown>,
  key: K,
  guard: (value: unknown) => value is T,
  fallback: () => T
): T;
export function valueOr<K, T>(
  source: ReadonlyMap<K, unknown> | Readonly<Record<string, unknown>>,
  key: K,
  guard: (value: unknown) => value is T,
  fallback: () => T
): T {
  const value = lookup(source, key);
  return guard(value) ? value : fallback();
}

function lookup<K>(
  source: ReadonlyMap<K, unknown> | Readonly<Record<string, unknown>>,
  key: K
): unknown {
  if (source instanceof Map) return source.get(key);
  if (typeof key !== "string" || !Object.prototype.hasOwnProperty.call(source, key)) {
    return undefined;
  }
  return Reflect.get(source, key);
}

// ============================================================================
// Guards
// ============================================================================

export function isNumber(value: unknown): value is number {
  return typeof value === "number";
}

export function isString(value: unknown): value is string {
  return typeof value === "string";
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

export const DictionaryExt = {
  valueOr,
  isNumber,
  isString,
  isBoolean,
} as const;
