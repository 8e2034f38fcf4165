/**
 * @sublex/rx
 *
 * Pattern matching for the sublex scanner, on top of JavaScript's RegExp:
 * - `compile` / `Pattern.matchAt` for matches anchored at an offset
 * - `def`, `idef`, `test`, `capture`, `replace` for everyday searching
 *
 * @module
 */

export type { MatchInfo, PatternSource } from "./types.js";

export { Pattern, PatternError, compile } from "./pattern.js";

export { Capture, def, idef, test, capture, replace } from "./capture.js";
