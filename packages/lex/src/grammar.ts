/**
 * Grammars: named lexical states built from ordered rules.
 *
 * A grammar tries its own rules in declaration order (first match wins, even
 * if a later rule would match more text), then the rules of each grammar it
 * inherits from, then its else-pop and else-push fallbacks.
 *
 * Grammars reference each other freely, through push targets and
 * inheritance, and the resulting graph may contain cycles: a grammar can
 * push itself to lex nested brackets.
 *
 * @example
 * ```typescript
 * const root = new Grammar<Tok>().named("root");
 * const list = root.sub().named("list");
 *
 * list
 *   .def(ignore("\\s+"))
 *   .def(match("[a-z]+"), "word")
 *   .def(push("\\(", list), "open")
 *   .def(pop("\\)"), "close");
 *
 * root.def(ignore("\\s+")).def(push("\\(", list), "open");
 * ```
 */

import { advanceLocation, type Location } from "./location.js";
import { defaultPop, defaultPush, type Rule } from "./rule.js";
import { Token } from "./token.js";

/** A rule together with the token type it emits, if any. */
export type QualifiedRule<T> =
  | { readonly rule: Rule<T>; readonly typed: true; readonly type: T }
  | { readonly rule: Rule<T>; readonly typed: false };

/** Outcome of one scan step. */
export interface ScanResult<T> {
  readonly rule: Rule<T>;
  /** True when the matched rule carries a token type. */
  readonly typed: boolean;
  readonly token: Token<T> | undefined;
  /** The location after the matched text. */
  readonly location: Location;
}

export interface GrammarOptions {
  name?: string;
  isSub?: boolean;
}

export class Grammar<T = string> {
  readonly isSub: boolean;
  private grammarName: string;
  private readonly ownRules: QualifiedRule<T>[] = [];
  private readonly parentGrammars: Grammar<T>[] = [];
  private readonly children: Grammar<T>[] = [];
  private popByDefault = false;
  private pushByDefault: Grammar<T> | undefined;

  constructor(options: GrammarOptions = {}) {
    this.grammarName = options.name ?? "?";
    this.isSub = options.isSub ?? false;
  }

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  /** Diagnostic name, shown in error grammar stacks. */
  get name(): string {
    return this.grammarName;
  }

  get rules(): readonly QualifiedRule<T>[] {
    return this.ownRules;
  }

  get parents(): readonly Grammar<T>[] {
    return this.parentGrammars;
  }

  get subGrammars(): readonly Grammar<T>[] {
    return this.children;
  }

  get defaultPop(): boolean {
    return this.popByDefault;
  }

  get defaultPushTarget(): Grammar<T> | undefined {
    return this.pushByDefault;
  }

  // -------------------------------------------------------------------------
  // Builder
  // -------------------------------------------------------------------------

  /**
   * Append a rule. With a `type`, the rule emits tokens of that type when it
   * matches (unless it is an ignore rule); without one it is silent.
   */
  def(rule: Rule<T>, ...type: [] | [T]): this {
    this.ownRules.push(
      type.length === 1 ? { rule, typed: true, type: type[0] } : { rule, typed: false }
    );
    return this;
  }

  named(name: string): this {
    this.grammarName = name;
    return this;
  }

  /** Pop this grammar, without consuming input, when nothing matches. */
  elsePop(): this {
    this.popByDefault = true;
    return this;
  }

  /** Push `target`, without consuming input, when nothing matches. */
  elsePush(target: Grammar<T>): this {
    this.pushByDefault = target;
    return this;
  }

  /** Fall back to `parent`'s rules after this grammar's own. */
  inherit(parent: Grammar<T>): this {
    this.parentGrammars.push(parent);
    return this;
  }

  /** Create a child grammar whose lifetime is tied to this one. */
  sub(): Grammar<T> {
    const child = new Grammar<T>({ isSub: true });
    this.children.push(child);
    return child;
  }

  // -------------------------------------------------------------------------
  // Scanning
  // -------------------------------------------------------------------------

  /**
   * Find the rule that applies at `location`.
   *
   * Order: own rules, then each parent's rules (depth first, in inheritance
   * order), then the else-pop fallback, then the else-push fallback.
   *
   * @returns undefined if nothing applies
   */
  scan(location: Location, buffer: string): ScanResult<T> | undefined {
    const matched = this.scanRules(location, buffer, new Set());
    if (matched) return matched;

    if (this.popByDefault) {
      return { rule: defaultPop<T>(), typed: false, token: undefined, location };
    }
    if (this.pushByDefault) {
      return { rule: defaultPush(this.pushByDefault), typed: false, token: undefined, location };
    }
    return undefined;
  }

  private scanRules(
    location: Location,
    buffer: string,
    visited: Set<Grammar<T>>
  ): ScanResult<T> | undefined {
    if (visited.has(this)) return undefined;
    visited.add(this);

    for (const qualified of this.ownRules) {
      const m = qualified.rule.matchAt(buffer, location.offset);
      if (!m) continue;
      const end = advanceLocation(location, m.groups[0]);
      return {
        rule: qualified.rule,
        typed: qualified.typed,
        token: qualified.typed ? new Token(qualified.type, m.groups, end, location) : undefined,
        location: end,
      };
    }

    for (const parent of this.parentGrammars) {
      const inherited = parent.scanRules(location, buffer, visited);
      if (inherited) return inherited;
    }

    return undefined;
  }
}
