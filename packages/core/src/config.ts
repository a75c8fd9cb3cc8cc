/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: TERSE_*
 * 3. Config files: package.json#terse, .terserc, .terserc.json, terse.config.cjs, ... (via cosmiconfig)
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@terse/core";
 *
 * config.get("math.tolerance")   // → number
 * config.get("defaults.date")    // → "epoch" | "reference"
 *
 * config.set({ debug: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Which instant `Date` values coalesce to.
 * "epoch" is 1970-01-01T00:00:00Z, "reference" is 2001-01-01T00:00:00Z.
 */
export type DateDefault = "epoch" | "reference";

export interface MathConfig {
  /** Absolute tolerance used by approximate comparisons */
  tolerance?: number;
}

export interface DefaultsConfig {
  date?: DateDefault;
}

/**
 * Full terse configuration schema.
 */
export interface TerseConfig {
  /** Enable debug logging */
  debug?: boolean;
  math?: MathConfig;
  defaults?: DefaultsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/**
 * Typed configuration paths and the value each one resolves to.
 */
export interface ConfigPaths {
  debug: boolean;
  "math.tolerance": number;
  "defaults.date": DateDefault;
}

export type ConfigPath = keyof ConfigPaths;

interface PathSchema<T> {
  fallback: T;
  accepts(value: unknown): value is T;
}

const schema: { [P in ConfigPath]: PathSchema<ConfigPaths[P]> } = {
  debug: {
    fallback: false,
    accepts: (value): value is boolean => typeof value === "boolean",
  },
  "math.tolerance": {
    fallback: 1e-9,
    accepts: (value): value is number =>
      typeof value === "number" && Number.isFinite(value) && value >= 0,
  },
  "defaults.date": {
    fallback: "epoch",
    accepts: (value): value is DateDefault => value === "epoch" || value === "reference",
  },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "TERSE_";

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^-?\d+(\.\d+)?(e[+-]?\d+)?$/i.test(value)) return Number(value);
  return value;
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   TERSE_DEBUG=1                  → { debug: true }
 *   TERSE_MATH_TOLERANCE=0.001     → { math: { tolerance: 0.001 } }
 *   TERSE_DEFAULTS_DATE=reference  → { defaults: { date: "reference" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");
    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "terse";

/**
 * JavaScript config files are only searched as `.cjs`: the synchronous
 * loader cannot evaluate an ES module, so `export default` would never
 * reach the store.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(`Failed to load ${MODULE_NAME} configuration`, undefined, {
      cause: error,
    });
  }

  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new ConfigError(`Configuration in ${result.filepath} must be an object`, result.filepath);
  }

  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: TerseConfig = {
    debug: schema.debug.fallback,
    math: { tolerance: schema["math.tolerance"].fallback },
    defaults: { date: schema["defaults.date"].fallback },
  };

  configStore = deepMerge(deepMerge(defaults, loadConfigFromFiles()), loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path. Values of the wrong shape fall back
 * to the path's default.
 */
function get<P extends ConfigPath>(path: P): ConfigPaths[P] {
  initializeConfig();
  const entry: PathSchema<ConfigPaths[P]> = schema[path];
  const value = getNestedValue(configStore, path);
  return entry.accepts(value) ? value : entry.fallback;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<TerseConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  initializeConfig();
  return !!getNestedValue(configStore, path);
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read reloads every source (mainly for testing).
 * The config file search starts at `from`, or the working directory when omitted.
 */
function reset(from?: string): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = from;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Identity helper giving config files type checking.
 */
export function defineConfig(cfg: TerseConfig): TerseConfig {
  return cfg;
}
