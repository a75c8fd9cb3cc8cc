/**
 * String conversion
 *
 * `describe` renders any value as readable text. Strings render as
 * themselves at the top level and quoted inside containers:
 *
 * ```ts
 * describe([21.5, NaN, 23]);        // "[21.5, NaN, 23]"
 * describe(["a", "b"]);             // '["a", "b"]'
 * describe(new Map([["x", 1]]));    // '["x": 1]'
 * describe({ id: 7, tags: [] });    // "{id: 7, tags: []}"
 * ```
 */

export function describe(value: unknown): string {
  return typeof value === "string" ? value : describeNested(value, new Set());
}

function describeNested(value: unknown, seen: Set<object>): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "bigint":
      return `${value}n`;
    case "symbol":
      return value.toString();
    case "function":
      return `[Function ${value.name || "anonymous"}]`;
    case "object":
      return value === null ? "null" : describeObject(value, seen);
    default:
      return String(value);
  }
}

function describeObject(value: object, seen: Set<object>): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (seen.has(value)) return "[Circular]";

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((item: unknown) => describeNested(item, seen)).join(", ")}]`;
    }
    if (value instanceof Map) {
      if (value.size === 0) return "[:]";
      const entries = Array.from(
        value,
        ([k, v]: [unknown, unknown]) => `${describeNested(k, seen)}: ${describeNested(v, seen)}`
      );
      return `[${entries.join(", ")}]`;
    }
    if (value instanceof Set) {
      const items = Array.from(value, (item: unknown) => describeNested(item, seen));
      return `Set([${items.join(", ")}])`;
    }
    const fields = Object.entries(value).map(
      ([k, v]) => `${k}: ${describeNested(v, seen)}`
    );
    return `{${fields.join(", ")}}`;
  } finally {
    seen.delete(value);
  }
}

/**
 * The runtime type of a value: the primitive's `typeof`, `"null"`, or the
 * constructor name of an object.
 */
export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object" && typeof value !== "function") return typeof value;
  if (typeof value === "function") return "Function";
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
}

/**
 * Writes `typeName(value)` to stdout.
 */
export function printType(value: unknown): void {
  console.log(typeName(value));
}

// ============================================================================
// Aggregate
// ============================================================================

export const StringExt = {
  describe,
  typeName,
  printType,
} as const;
