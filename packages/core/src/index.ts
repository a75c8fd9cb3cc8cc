/**
 * Core module exports for @terse/core
 *
 * This package provides:
 * - Configuration (files, TERSE_* environment variables, programmatic overrides)
 * - Error classes shared by every terse package
 * - Debug logging
 */

// Configuration System
export {
  config,
  defineConfig,
  type TerseConfig,
  type MathConfig,
  type DefaultsConfig,
  type DateDefault,
  type ConfigPaths,
  type ConfigPath,
} from "./config.js";

// Errors
export {
  TerseError,
  UnexpectedEmptyError,
  DomainError,
  ConfigError,
  type TerseErrorKind,
} from "./errors.js";

// Logging
export { debugLog, isDebugEnabled } from "./debug.js";
