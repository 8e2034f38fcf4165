/**
 * Unanchored helpers over compiled patterns: search, capture, replace.
 */

import { Pattern } from "./pattern.js";
import type { PatternSource } from "./types.js";

/** A regular expression match and its capture groups. */
export class Capture {
  readonly length: number;
  readonly groups: readonly string[];

  constructor(groups: readonly string[] = []) {
    this.groups = groups;
    this.length = groups.length > 0 ? groups[0].length : 0;
  }

  /** True when the search found a match. */
  get ok(): boolean {
    return this.groups.length > 0;
  }

  /** The whole match ("" when nothing matched). */
  get str(): string {
    return this.group(0);
  }

  /** Capture group `n`, or "" when it does not exist. */
  group(n = 0): string {
    return this.groups[n] ?? "";
  }

  toString(): string {
    return `Capture<${this.groups.map((g) => JSON.stringify(g)).join(",")}>`;
  }
}

function asPattern(p: Pattern | PatternSource): Pattern {
  return p instanceof Pattern ? p : new Pattern(p);
}

/** Compile a pattern (case-sensitive). */
export function def(source: PatternSource): Pattern {
  return new Pattern(source);
}

/** Compile a case-insensitive pattern. */
export function idef(source: PatternSource): Pattern {
  return new Pattern(source, true);
}

/** True if the pattern matches anywhere in `s`. */
export function test(pattern: Pattern | PatternSource, s: string): boolean {
  return asPattern(pattern).toRegExp().test(s);
}

/** Search `s` and return the first match with its groups. */
export function capture(pattern: Pattern | PatternSource, s: string): Capture {
  const m = asPattern(pattern).toRegExp().exec(s);
  if (!m) return new Capture();
  return new Capture(Array.from(m, (g) => g ?? ""));
}

/**
 * Replace every match of `pattern` in `s` using a `$1`-style format string.
 */
export function replace(pattern: Pattern | PatternSource, s: string, format: string): string {
  return s.replace(asPattern(pattern).toRegExp("g"), format);
}
