/**
 * Scan-time errors. Each carries the exact location the scanner stopped at.
 *
 * Grammar construction mistakes are not reported here: they throw
 * `InvariantError` from @sublex/core, and bad patterns throw `PatternError`
 * from @sublex/rx.
 */

import { formatLocation, type Location } from "./location.js";

/** Base class for errors raised while scanning input. */
export class LexError extends Error {
  /** Where the error occurred */
  readonly location: Location;

  constructor(message: string, location: Location) {
    super(message);
    this.name = "LexError";
    this.location = location;
  }
}

function stackTrail(grammarStack: readonly string[]): string {
  return grammarStack.join(" > ");
}

/**
 * No rule in the reachable grammar graph matched at `location`.
 */
export class NoMatchError extends LexError {
  /** The character the scanner could not consume */
  readonly character: string;
  /** Grammar names from the bottom to the top of the stack */
  readonly grammarStack: readonly string[];

  constructor(location: Location, character: string, grammarStack: readonly string[]) {
    super(
      `No rule matched ${JSON.stringify(character)} at ${formatLocation(location)} ` +
        `(grammar stack: ${stackTrail(grammarStack)})`,
      location
    );
    this.name = "NoMatchError";
    this.character = character;
    this.grammarStack = grammarStack;
  }
}

/**
 * The grammar stack emptied before the whole buffer was consumed.
 */
export class UnexpectedEndOfContentError extends LexError {
  constructor(location: Location) {
    super(`Unexpected end of content at ${formatLocation(location)}`, location);
    this.name = "UnexpectedEndOfContentError";
  }
}

/**
 * Too many consecutive steps went by without the offset moving, e.g. a
 * zero-width match rule, or stay transitions that push and pop forever.
 */
export class StalledScanError extends LexError {
  readonly grammarStack: readonly string[];
  readonly steps: number;

  constructor(location: Location, grammarStack: readonly string[], steps: number) {
    super(
      `Scan stalled after ${steps} steps without progress at ${formatLocation(location)} ` +
        `(grammar stack: ${stackTrail(grammarStack)})`,
      location
    );
    this.name = "StalledScanError";
    this.grammarStack = grammarStack;
    this.steps = steps;
  }
}
