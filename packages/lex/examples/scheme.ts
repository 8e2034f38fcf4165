/**
 * A small Scheme lexer: nested s-expressions through a self-pushing grammar.
 */

import { Grammar, ignore, match, pop, push } from "../src/index.js";

export type SchemeToken = "quote" | "number" | "word" | "open-paren" | "close-paren";

export function makeSchemeGrammar(): Grammar<SchemeToken> {
  const root = new Grammar<SchemeToken>().named("root");
  const sexpr = root.sub().named("sexpr");

  sexpr
    .def(ignore("\\s+"))
    .def(match("`"), "quote")
    .def(match("[0-9]*\\.?[0-9]+"), "number")
    .def(match("[-!?+*/A-Za-z_][-!?+*/A-Za-z_0-9]*"), "word")
    .def(push("\\(", sexpr), "open-paren")
    .def(pop("\\)"), "close-paren");

  root.def(ignore("\\s+")).def(push("\\(", sexpr), "open-paren");

  return root;
}
