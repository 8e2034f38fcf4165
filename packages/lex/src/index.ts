/**
 * @sublex/lex
 *
 * A stateful, grammar-driven lexical scanner. Grammars are ordered lists of
 * regular-expression rules that can push into and pop out of other grammars,
 * inherit rules from one another and fall back to default transitions.
 *
 * @module
 */

// Locations and positioned input
export type { Location } from "./location.js";
export { startOf, nowhere, advanceLocation, formatLocation } from "./location.js";
export { Cursor, EOF } from "./cursor.js";

// Rules and grammars
export type { Action } from "./rule.js";
export { Rule, ignore, match, push, pop, defaultPop, defaultPush } from "./rule.js";
export type { QualifiedRule, ScanResult, GrammarOptions } from "./grammar.js";
export { Grammar } from "./grammar.js";

// Tokens and the scan loop
export { Token } from "./token.js";
export type { LexerOptions, LexResult } from "./lexer.js";
export { Lexer } from "./lexer.js";

// Errors
export { LexError, NoMatchError, UnexpectedEndOfContentError, StalledScanError } from "./errors.js";
export { InvariantError } from "@sublex/core";
export { PatternError } from "@sublex/rx";
