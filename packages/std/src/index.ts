/**
 * @terse/std — Standard Library
 *
 * Named, typed forms of the everyday container operations:
 *
 * - Sequences: mapped, compactMapped, filtered, reduced, reducedWithDefault,
 *   forEach, times, sortedBy
 * - Optionals: coalesce, unwrap, isNone, isSome, optionalize, compact
 * - Defaultable: a default value per built-in type
 * - Range: iterable half-open and closed numeric ranges
 * - Collections, dictionaries, strings and dates
 *
 * @example
 * ```ts
 * import { mapped, reducedWithDefault, defaultNumber, rangeInclusive } from "@terse/std";
 *
 * const squares = mapped(rangeInclusive(1, 8), (n) => n * n);
 * reducedWithDefault(squares, defaultNumber, (a, b) => a + b); // 204
 * ```
 */

// Typeclasses
export * from "./typeclasses/index.js";

// Extension methods
export * from "./extensions/index.js";

// Data types
export * from "./data/index.js";
