/**
 * The scan loop: drives a stack of grammars over a fully buffered input.
 *
 * | Action | Token emitted? | Stack effect      |
 * |--------|----------------|-------------------|
 * | ignore | never          | none              |
 * | match  | if typed       | none              |
 * | push   | if typed       | push rule target  |
 * | pop    | if typed       | pop               |
 *
 * The location advances past the matched text unless the rule stays.
 * Scanning ends when the stack empties or the input is exhausted.
 */

import { readFile } from "node:fs/promises";
import { TextDecoder } from "node:util";
import { config, createDebugLog, invariant, unreachable, type DebugLog } from "@sublex/core";
import { Cursor } from "./cursor.js";
import { LexError, NoMatchError, StalledScanError, UnexpectedEndOfContentError } from "./errors.js";
import type { Grammar } from "./grammar.js";
import { formatLocation, type Location } from "./location.js";
import { Token } from "./token.js";

export interface LexerOptions {
  /** Throw on unmatched input instead of returning the tokens so far (default true) */
  throwOnError?: boolean;
  /** Print every scan step to the console (default false) */
  debug?: boolean;
  /** Steps other than pops allowed without advancing the offset (default 1000) */
  maxIdleSteps?: number;
}

/**
 * Outcome of `tryLex`. `ok` is false whenever scanning stopped before the
 * end of input; `error` then says why.
 */
export type LexResult<T> =
  | { ok: true; tokens: Token<T>[]; location: Location }
  | { ok: false; tokens: Token<T>[]; location: Location; error: LexError };

const DEFAULT_MAX_IDLE_STEPS = 1000;

export class Lexer<T = string> {
  readonly root: Grammar<T>;
  private stack: Grammar<T>[];
  private strict: boolean;
  private verbose: boolean;
  private readonly maxIdleSteps: number;

  constructor(root: Grammar<T>, options: LexerOptions = {}) {
    this.root = root;
    this.stack = [root];
    this.strict = options.throwOnError ?? config.getBoolean("lex.throwOnError") ?? true;
    this.verbose = options.debug ?? config.getBoolean("debug") ?? false;
    this.maxIdleSteps =
      options.maxIdleSteps ?? config.getNumber("lex.maxIdleSteps") ?? DEFAULT_MAX_IDLE_STEPS;
  }

  /** Choose between raising scan errors and returning partial results. */
  throwOnError(enabled = true): this {
    this.strict = enabled;
    return this;
  }

  /** Echo scan steps and failures to the console. */
  debug(enabled = true): this {
    this.verbose = enabled;
    return this;
  }

  /** Number of grammars on the stack. */
  get depth(): number {
    return this.stack.length;
  }

  /** Grammar names from the bottom to the top of the stack. */
  get grammarStack(): string[] {
    return this.stack.map((g) => g.name);
  }

  /**
   * Tokenize `buffer`.
   *
   * @param name - input name recorded in every location
   * @throws NoMatchError when no rule applies (unless throwOnError is off)
   * @throws UnexpectedEndOfContentError when the stack empties early (same)
   * @throws StalledScanError when the scan stops making progress
   */
  lex(buffer: string, name = ""): Token<T>[] {
    const result = this.tryLex(buffer, name);
    if (!result.ok && this.strict) {
      throw result.error;
    }
    return result.tokens;
  }

  /**
   * Tokenize `buffer`, reporting input the grammar cannot consume in the
   * result instead of throwing.
   */
  tryLex(buffer: string, name = ""): LexResult<T> {
    const log = createDebugLog("sublex", this.verbose);
    const cursor = new Cursor(buffer, name);
    const tokens: Token<T>[] = [];
    let idleSteps = 0;

    this.stack = [this.root];

    while (this.stack.length > 0 && !cursor.done) {
      const grammar = this.stack[this.stack.length - 1];
      const result = grammar.scan(cursor.location, buffer);

      if (!result) {
        const code = buffer.codePointAt(cursor.offset);
        const error = new NoMatchError(
          cursor.location,
          code === undefined ? "" : String.fromCodePoint(code),
          this.grammarStack
        );
        log(error.message);
        log(`grammar stack: ${this.grammarStack.join(" > ")}`);
        return { ok: false, tokens, location: cursor.location, error };
      }

      const { rule, token } = result;
      invariant(
        !result.typed || token !== undefined,
        `Typed rule ${rule.toString()} did not yield a token at ${formatLocation(cursor.location)}`
      );

      switch (rule.action) {
        case "ignore":
          break;
        case "match":
          if (token) tokens.push(token);
          break;
        case "push":
          invariant(rule.target !== undefined, `Push rule ${rule.toString()} has no target`);
          if (token) tokens.push(token);
          this.stack.push(rule.target);
          break;
        case "pop":
          if (token) tokens.push(token);
          this.stack.pop();
          break;
        default:
          unreachable(rule.action);
      }

      this.trace(log, rule.action, token);

      const before = cursor.offset;
      if (rule.consumesInput) {
        cursor.moveTo(result.location);
      }

      // Pops are bounded by the pushes before them, so only the other idle steps count.
      if (cursor.offset !== before) {
        idleSteps = 0;
      } else if (rule.action !== "pop") {
        idleSteps++;
      }
      if (idleSteps > this.maxIdleSteps) {
        throw new StalledScanError(cursor.location, this.grammarStack, idleSteps);
      }
    }

    if (!cursor.done) {
      const error = new UnexpectedEndOfContentError(cursor.location);
      log(error.message);
      return { ok: false, tokens, location: cursor.location, error };
    }

    return { ok: true, tokens, location: cursor.location };
  }

  /** Read an async stream of text or bytes to the end, then tokenize it. */
  async lexStream(stream: AsyncIterable<string | Uint8Array>, name = ""): Promise<Token<T>[]> {
    const decoder = new TextDecoder();
    let buffer = "";
    for await (const chunk of stream) {
      buffer += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
    }
    buffer += decoder.decode();
    return this.lex(buffer, name);
  }

  /** Tokenize a UTF-8 file; locations are named after `path`. */
  async lexFile(path: string): Promise<Token<T>[]> {
    return this.lex(await readFile(path, "utf8"), path);
  }

  private trace(log: DebugLog, action: string, token: Token<T> | undefined): void {
    const shown = token ?? Token.nothing();
    log(`${action} ${shown.toString()} [${this.grammarStack.join(" > ")}]`);
  }
}
