import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { TextEncoder } from "node:util";
import { Lexer } from "../lexer.js";
import { formatLocation } from "../location.js";
import { NoMatchError } from "../errors.js";
import { makeSchemeGrammar, type SchemeToken } from "../../examples/scheme.js";

const SAMPLE = fileURLToPath(new URL("../../examples/data/sample.scm", import.meta.url));

function lexScheme(input: string): Array<[SchemeToken, string]> {
  return new Lexer(makeSchemeGrammar())
    .lex(input)
    .map((t): [SchemeToken, string] => [t.type, t.text]);
}

describe("scheme lexer", () => {
  it("lexes a flat expression", () => {
    expect(lexScheme("(+ 1 2.5)")).toEqual([
      ["open-paren", "("],
      ["word", "+"],
      ["number", "1"],
      ["number", "2.5"],
      ["close-paren", ")"],
    ]);
  });

  it("lexes quotes inside expressions", () => {
    expect(lexScheme("(`a)")).toEqual([
      ["open-paren", "("],
      ["quote", "`"],
      ["word", "a"],
      ["close-paren", ")"],
    ]);
  });

  it("rejects bare atoms at the top level", () => {
    expect(() => lexScheme("(a) b")).toThrow(NoMatchError);
  });

  it("produces identical tokens from identically built grammars", () => {
    const input = "(define (f x) (* x 2))";
    const first = new Lexer(makeSchemeGrammar()).lex(input);
    const second = new Lexer(makeSchemeGrammar()).lex(input);
    expect(second).toEqual(first);
    expect(new Lexer(makeSchemeGrammar()).lex(input)).toEqual(first);
  });

  it("lexes a file with named locations", async () => {
    const tokens = await new Lexer(makeSchemeGrammar()).lexFile(SAMPLE);
    expect(tokens.map((t) => t.type)).toEqual([
      "open-paren",
      "word",
      "open-paren",
      "word",
      "word",
      "close-paren",
      "open-paren",
      "word",
      "word",
      "word",
      "close-paren",
      "close-paren",
      "open-paren",
      "word",
      "number",
      "close-paren",
    ]);
    const last = tokens[tokens.length - 1];
    expect(formatLocation(last.location)).toBe(`${SAMPLE}:3:13`);
  });

  it("lexes a stream of mixed text and byte chunks", async () => {
    async function* chunks(): AsyncGenerator<string | Uint8Array> {
      yield new TextEncoder().encode("(squ");
      yield "are ";
      yield new TextEncoder().encode("4)");
    }
    const tokens = await new Lexer(makeSchemeGrammar()).lexStream(chunks(), "stdin");
    expect(tokens.map((t) => t.text)).toEqual(["(", "square", "4", ")"]);
    expect(tokens[1].start.name).toBe("stdin");
  });
});
