/**
 * Positioned input: a materialized buffer plus a forward-only cursor.
 */

import { InvariantError } from "@sublex/core";
import { advanceLocation, startOf, type Location } from "./location.js";

/** Returned by `peek()` past the end of the buffer. */
export const EOF: unique symbol = Symbol("EOF");
export type EOF = typeof EOF;

export class Cursor {
  readonly buffer: string;
  private loc: Location;

  constructor(buffer: string, name = "") {
    this.buffer = buffer;
    this.loc = startOf(name);
  }

  get location(): Location {
    return this.loc;
  }

  get offset(): number {
    return this.loc.offset;
  }

  /** True once every character has been consumed. */
  get done(): boolean {
    return this.loc.offset >= this.buffer.length;
  }

  /** The unconsumed tail of the buffer. */
  get remaining(): string {
    return this.buffer.slice(this.loc.offset);
  }

  /**
   * The character `k` positions ahead (1 = the next unconsumed character),
   * or `EOF` past the end.
   */
  peek(k = 1): string | EOF {
    const i = this.loc.offset + k - 1;
    return i >= 0 && i < this.buffer.length ? this.buffer[i] : EOF;
  }

  /** Consume up to `n` characters and return them. */
  advance(n = 1): string {
    const text = this.buffer.slice(this.loc.offset, this.loc.offset + Math.max(0, n));
    this.loc = advanceLocation(this.loc, text);
    return text;
  }

  /** Jump forward to a location previously computed over this buffer. */
  moveTo(loc: Location): void {
    if (loc.offset < this.loc.offset) {
      throw new InvariantError(
        `Cursor cannot move backwards (from offset ${this.loc.offset} to ${loc.offset})`
      );
    }
    this.loc = loc;
  }
}
