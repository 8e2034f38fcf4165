import { describe, it, expect } from "vitest";
import { InvariantError } from "@sublex/core";
import { PatternError } from "@sublex/rx";
import { Grammar } from "../grammar.js";
import { Rule, defaultPop, defaultPush, ignore, match, pop, push } from "../rule.js";
import { Token } from "../token.js";
import { LexError } from "../errors.js";
import { startOf } from "../location.js";

describe("rule factories", () => {
  const inner = new Grammar().named("inner");

  it("creates consuming rules for every action", () => {
    expect(ignore("\\s+").action).toBe("ignore");
    expect(match("[a-z]+").action).toBe("match");
    expect(push("\\(", inner).action).toBe("push");
    expect(pop("\\)").action).toBe("pop");
    expect(match("a").consumesInput).toBe(true);
  });

  it("sets a target only on push rules", () => {
    expect(push("\\(", inner).target).toBe(inner);
    expect(pop("\\)").target).toBeUndefined();
  });

  it("keeps the pattern source", () => {
    expect(match("[0-9]+").source).toBe("[0-9]+");
    expect(match(/[0-9]+/).source).toBe("[0-9]+");
  });

  it("reports invalid patterns when the rule is built", () => {
    expect(() => match("(")).toThrow(PatternError);
  });

  it("matches anchored at the offset", () => {
    expect(match("b").matchAt("ab", 0)).toBeUndefined();
    expect(match("b").matchAt("ab", 1)?.groups).toEqual(["b"]);
  });
});

describe("modifiers", () => {
  const inner = new Grammar().named("inner");

  it("icase() returns a case-insensitive copy", () => {
    const rule = match("select");
    const folded = rule.icase();
    expect(folded).not.toBe(rule);
    expect(folded.caseInsensitive).toBe(true);
    expect(rule.caseInsensitive).toBe(false);
    expect(folded.matchAt("SeLeCt", 0)?.length).toBe(6);
  });

  it("stay() marks push and pop rules as non-consuming", () => {
    expect(push("<", inner).stay().consumesInput).toBe(false);
    expect(pop(">").stay().consumesInput).toBe(false);
  });

  it("modifiers compose", () => {
    const rule = push("x", inner).stay().icase();
    expect(rule.consumesInput).toBe(false);
    expect(rule.caseInsensitive).toBe(true);
    expect(rule.target).toBe(inner);
  });

  it("stay() on ignore or match is a usage error", () => {
    expect(() => ignore("x").stay()).toThrow(InvariantError);
    expect(() => match("x").stay()).toThrow(
      "stay() is only valid on push and pop rules, not on match /x/"
    );
  });

  it("describes itself", () => {
    expect(push("\\(", inner).stay().toString()).toBe("push /\\(/ -> inner (stay)");
    expect(match("a").icase().toString()).toBe("match /a/i");
  });
});

describe("default rules", () => {
  it("defaultPop is a zero-width staying pop", () => {
    const rule: Rule<string> = defaultPop();
    expect(rule.action).toBe("pop");
    expect(rule.consumesInput).toBe(false);
    expect(rule.matchAt("abc", 1)).toEqual({ length: 0, groups: [""] });
  });

  it("defaultPush targets the given grammar", () => {
    const target = new Grammar();
    const rule = defaultPush(target);
    expect(rule.action).toBe("push");
    expect(rule.target).toBe(target);
    expect(rule.consumesInput).toBe(false);
  });
});

describe("Token", () => {
  const start = startOf();
  const end = { line: 1, col: 5, offset: 4, name: "" };
  const token = new Token("pair", ["a=bc", "a", "bc"], end, start);

  it("exposes the matched text and groups", () => {
    expect(token.text).toBe("a=bc");
    expect(token.match(1)).toBe("a");
    expect(token.match(2)).toBe("bc");
  });

  it("throws for missing groups", () => {
    expect(() => token.match(3)).toThrow(LexError);
    expect(() => token.match(3)).toThrow("Token of type 'pair' has no group 3");
  });

  it("records start and end", () => {
    expect(token.start).toBe(start);
    expect(token.location).toBe(end);
  });

  it("renders for debugging", () => {
    expect(token.toString()).toBe("<pair@1:5 (a=bc,a,bc)>");
    expect(Token.nothing().toString()).toBe("<nothing>");
  });
});
