/**
 * Core types for @sublex/rx
 */

/** Result of an anchored match: how much input it covers and its capture groups. */
export interface MatchInfo {
  /** Number of UTF-16 code units matched (may be 0). */
  readonly length: number;
  /** Group 0 is the whole match; groups that did not participate are "". */
  readonly groups: readonly string[];
}

/** Source accepted wherever a pattern is expected. */
export type PatternSource = string | RegExp;
