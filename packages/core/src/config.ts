/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: SUBLEX_* (for CI overrides)
 * 3. Config files: package.json#sublex, .sublexrc, sublex.config.json, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@sublex/core";
 *
 * config.getBoolean("debug")             // → boolean | undefined
 * config.getNumber("lex.maxIdleSteps")   // → number | undefined
 *
 * config.set({ lex: { throwOnError: false } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Lexer defaults.
 */
export interface LexConfig {
  /** Raise NoMatchError / UnexpectedEndOfContentError instead of stopping early */
  throwOnError?: boolean;
  /** Consecutive scan steps allowed without advancing the offset */
  maxIdleSteps?: number;
}

/**
 * Full sublex configuration schema.
 */
export interface SublexConfig {
  /** Echo emitted tokens and scan failures to the console */
  debug?: boolean;
  /** Lexer configuration */
  lex?: LexConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "sublex";
const ENV_PREFIX = "SUBLEX_";

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Convert an environment variable suffix to a config path.
 *
 *   DEBUG                 → debug
 *   LEX__THROW_ON_ERROR   → lex.throwOnError
 */
export function envKeyToPath(key: string): string {
  return key
    .toLowerCase()
    .split("__")
    .map((segment) => segment.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase()))
    .join(".");
}

function parseEnvValue(value: string): unknown {
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (value === "true") return true;
  if (value === "false" || value === "") return false;
  return value;
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   SUBLEX_DEBUG=1                     → { debug: true }
 *   SUBLEX_LEX__MAX_IDLE_STEPS=50      → { lex: { maxIdleSteps: 50 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    setNestedValue(envConfig, envKeyToPath(key.slice(ENV_PREFIX.length)), parseEnvValue(value));
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
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
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

function loadConfigFromFiles(): ConfigRecord {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.json`,
    ],
  });
  const result = explorer.search();
  if (result && !result.isEmpty && isRecord(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: SublexConfig = {
  debug: false,
  lex: {
    throwOnError: true,
    maxIdleSteps: 1000,
  },
};

function initializeConfig(): void {
  if (configLoaded) return;

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(
    deepMerge(DEFAULTS, loadConfigFromFiles()),
    loadConfigFromEnv(process.env)
  );
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Get a boolean configuration value. 1 and 0 (as set by `SUBLEX_DEBUG=1`)
 * read as true and false; anything else reads as undefined.
 */
function getBoolean(path: string): boolean | undefined {
  const value = get(path);
  if (value === 1 || value === 0) return value === 1;
  return typeof value === "boolean" ? value : undefined;
}

/**
 * Get a numeric configuration value; anything else reads as undefined.
 */
function getNumber(path: string): number | undefined {
  const value = get(path);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: SublexConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

function has(path: string): boolean {
  return get(path) !== undefined;
}

/**
 * Get all configuration values.
 */
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
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  getBoolean,
  getNumber,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;
