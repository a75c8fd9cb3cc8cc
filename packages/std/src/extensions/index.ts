// Extension namespace objects
//
// Each aggregate gathers one module's functions so they can be passed
// around or registered as a unit:
//
//   import { SequenceExt } from "@terse/std";
//   SequenceExt.mapped([1, 2, 3], (n) => n * 2); // [2, 4, 6]
//
export { SequenceExt } from "./sequence.js";
export { OptionalExt } from "./optional.js";
export { CollectionExt } from "./collection.js";
export { DictionaryExt } from "./dictionary.js";
export { StringExt } from "./string.js";
export { DateExt } from "./date.js";

export * from "./sequence.js";
export * from "./optional.js";
export * from "./collection.js";
export * from "./dictionary.js";
export * from "./string.js";
export * from "./date.js";
