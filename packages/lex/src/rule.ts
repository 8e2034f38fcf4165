/**
 * Rules: one pattern-to-action mapping within a grammar.
 *
 * ```typescript
 * ignore("\\s+")
 * match("[0-9]+")
 * push("\\(", inner)
 * pop("\\)")
 * push("(?=<)", tag).stay()
 * match("select").icase()
 * ```
 */

import { compile, type MatchInfo, type Pattern, type PatternSource } from "@sublex/rx";
import { invariant } from "@sublex/core";
import type { Grammar } from "./grammar.js";

/** What happens when a rule's pattern matches. */
export type Action = "ignore" | "match" | "push" | "pop";

interface RuleSpec<T> {
  action: Action;
  pattern: Pattern;
  consumesInput: boolean;
  target: Grammar<T> | undefined;
}

export class Rule<T = string> {
  readonly action: Action;
  readonly pattern: Pattern;
  /** False for "stay" rules, which change state without consuming input. */
  readonly consumesInput: boolean;
  /** The grammar a push rule enters; undefined for every other action. */
  readonly target: Grammar<T> | undefined;

  private constructor(spec: RuleSpec<T>) {
    invariant(
      (spec.action === "push") === (spec.target !== undefined),
      `A ${spec.action} rule ${spec.action === "push" ? "requires" : "cannot have"} a target grammar`
    );
    this.action = spec.action;
    this.pattern = spec.pattern;
    this.consumesInput = spec.consumesInput;
    this.target = spec.target;
  }

  /** @internal */
  static create<T>(action: Action, source: PatternSource, target?: Grammar<T>): Rule<T> {
    return new Rule({ action, pattern: compile(source), consumesInput: true, target });
  }

  get source(): string {
    return this.pattern.source;
  }

  get caseInsensitive(): boolean {
    return this.pattern.caseInsensitive;
  }

  /** A copy of this rule whose pattern ignores case. */
  icase(): Rule<T> {
    return new Rule({ ...this.spec(), pattern: this.pattern.icase() });
  }

  /**
   * A copy of this rule that transitions without consuming the matched text.
   * Only push and pop rules can stay.
   */
  stay(): Rule<T> {
    invariant(
      this.action === "push" || this.action === "pop",
      `stay() is only valid on push and pop rules, not on ${this.action} /${this.source}/`
    );
    return new Rule({ ...this.spec(), consumesInput: false });
  }

  /** Match this rule's pattern anchored at `offset`. */
  matchAt(buffer: string, offset: number): MatchInfo | undefined {
    return this.pattern.matchAt(buffer, offset);
  }

  toString(): string {
    const target = this.target ? ` -> ${this.target.name}` : "";
    const stay = this.consumesInput ? "" : " (stay)";
    return `${this.action} ${this.pattern.toString()}${target}${stay}`;
  }

  private spec(): RuleSpec<T> {
    return {
      action: this.action,
      pattern: this.pattern,
      consumesInput: this.consumesInput,
      target: this.target,
    };
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/** Consume matching text silently. */
export function ignore<T = never>(pattern: PatternSource): Rule<T> {
  return Rule.create<T>("ignore", pattern);
}

/** Consume matching text, emitting a token when the rule is typed. */
export function match<T = never>(pattern: PatternSource): Rule<T> {
  return Rule.create<T>("match", pattern);
}

/** Consume matching text and enter `target`. */
export function push<T>(pattern: PatternSource, target: Grammar<T>): Rule<T> {
  return Rule.create("push", pattern, target);
}

/** Consume matching text and leave the current grammar. */
export function pop<T = never>(pattern: PatternSource): Rule<T> {
  return Rule.create<T>("pop", pattern);
}

/** The zero-width pop taken by a grammar's `elsePop()` fallback. */
export function defaultPop<T = never>(): Rule<T> {
  return pop<T>("").stay();
}

/** The zero-width push taken by a grammar's `elsePush()` fallback. */
export function defaultPush<T>(target: Grammar<T>): Rule<T> {
  return push("", target).stay();
}
