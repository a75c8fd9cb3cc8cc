/**
 * Error Types
 *
 * Numeric domain failures surface as NaN and never reach these classes.
 * They cover the cases that must fail loudly instead: a missing value
 * that was asserted present, a precondition on an argument, and a
 * malformed configuration file.
 */

export type TerseErrorKind = "unexpected-empty" | "domain" | "config";

/**
 * Base class for every error thrown by terse packages.
 */
export class TerseError extends Error {
  constructor(
    message: string,
    public readonly kind: TerseErrorKind,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "TerseError";
  }
}

/**
 * Thrown when an optional value is unwrapped while absent.
 */
export class UnexpectedEmptyError extends TerseError {
  constructor(message: string = "Unexpectedly found an empty value while unwrapping") {
    super(message, "unexpected-empty");
    this.name = "UnexpectedEmptyError";
  }
}

/**
 * Thrown by the checked variants of numeric operations when an argument
 * lies outside the operation's domain.
 */
export class DomainError extends TerseError {
  constructor(
    message: string,
    public readonly operation: string
  ) {
    super(message, "domain");
    this.name = "DomainError";
  }
}

/**
 * Thrown when a configuration file exists but cannot be loaded.
 */
export class ConfigError extends TerseError {
  constructor(
    message: string,
    public readonly filePath?: string,
    options?: ErrorOptions
  ) {
    super(message, "config", options);
    this.name = "ConfigError";
  }
}
