/**
 * Compiled patterns for @sublex/rx
 *
 * A `Pattern` wraps a sticky `RegExp`, so every match is anchored at the
 * offset it is asked about: a pattern that would match later in the buffer
 * does not match at all.
 */

import type { MatchInfo, PatternSource } from "./types.js";

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/** Invalid pattern syntax, reported when the pattern is compiled. */
export class PatternError extends Error {
  /** The pattern text that failed to compile. */
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Invalid pattern /${source}/: ${reason}`);
    this.name = "PatternError";
    this.source = source;
  }
}

// ---------------------------------------------------------------------------
// Pattern
// ---------------------------------------------------------------------------

/** Flags carried over from a `RegExp` source; g and y are managed here. */
const KEPT_FLAGS = /[imsu]/g;

function buildRegExp(source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    throw new PatternError(source, err instanceof Error ? err.message : String(err));
  }
}

function toGroups(m: RegExpExecArray): string[] {
  return Array.from(m, (g) => g ?? "");
}

export class Pattern {
  /** The pattern text as written by the caller. */
  readonly source: string;
  readonly caseInsensitive: boolean;
  private readonly extraFlags: string;
  private readonly sticky: RegExp;

  constructor(source: PatternSource, caseInsensitive = false) {
    if (source instanceof RegExp) {
      const kept = (source.flags.match(KEPT_FLAGS) ?? []).join("");
      this.source = source.source;
      this.caseInsensitive = caseInsensitive || source.ignoreCase;
      this.extraFlags = kept.replace("i", "");
    } else {
      this.source = source;
      this.caseInsensitive = caseInsensitive;
      this.extraFlags = "";
    }
    this.sticky = buildRegExp(this.source, this.flags("y"));
  }

  /** A copy of this pattern compiled case-insensitively. */
  icase(): Pattern {
    return new Pattern(new RegExp(this.source, this.flags("")), true);
  }

  /**
   * Match anchored at `offset`.
   *
   * @returns the match, or undefined when no match starts exactly at `offset`
   */
  matchAt(buffer: string, offset: number): MatchInfo | undefined {
    if (offset < 0 || offset > buffer.length) return undefined;
    this.sticky.lastIndex = offset;
    const m = this.sticky.exec(buffer);
    this.sticky.lastIndex = 0;
    if (!m) return undefined;
    return { length: m[0].length, groups: toGroups(m) };
  }

  /** A fresh unanchored RegExp with the given extra flags (g, y or none). */
  toRegExp(mode: "" | "g" | "y" = ""): RegExp {
    return new RegExp(this.source, this.flags(mode));
  }

  toString(): string {
    return `/${this.source}/${this.flags("")}`;
  }

  private flags(mode: string): string {
    return `${mode}${this.caseInsensitive ? "i" : ""}${this.extraFlags}`;
  }
}

/**
 * Compile a pattern.
 *
 * @throws PatternError if the syntax is invalid
 */
export function compile(source: PatternSource, caseInsensitive = false): Pattern {
  return new Pattern(source, caseInsensitive);
}
