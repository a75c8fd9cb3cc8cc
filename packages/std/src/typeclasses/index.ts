/**
 * Standard Typeclasses
 */

export * from "./defaultable.js";
