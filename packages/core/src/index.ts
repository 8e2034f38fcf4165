/**
 * @sublex/core
 *
 * Shared infrastructure for the sublex packages:
 * - Unified configuration (defaults, config files, SUBLEX_* environment)
 * - Runtime safety primitives (invariant, unreachable)
 * - Debug logging
 *
 * @module
 */

export { config, envKeyToPath } from "./config.js";
export type { SublexConfig, LexConfig } from "./config.js";

export { InvariantError, invariant, unreachable } from "./safety.js";

export { createDebugLog } from "./log.js";
export type { DebugLog } from "./log.js";
