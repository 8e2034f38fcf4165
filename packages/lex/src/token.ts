import { formatLocation, nowhere, type Location } from "./location.js";
import { LexError } from "./errors.js";

/**
 * An emitted unit of output: a type tag, the captured groups and the
 * location at which the match ended.
 */
export class Token<T = string> {
  readonly type: T;
  /** Group 0 is the whole match, followed by the pattern's capture groups. */
  readonly groups: readonly string[];
  /** Where the match ended */
  readonly location: Location;
  /** Where the match began */
  readonly start: Location;

  constructor(type: T, groups: readonly string[], location: Location, start: Location = location) {
    this.type = type;
    this.groups = groups;
    this.location = location;
    this.start = start;
  }

  /** Placeholder printed in debug output for steps that emit nothing. */
  static nothing(): Token<undefined> {
    return new Token(undefined, [], nowhere());
  }

  /** The whole matched text. */
  get text(): string {
    return this.match(0);
  }

  /**
   * Capture group `group` of the match.
   *
   * @throws LexError if the pattern has no such group
   */
  match(group = 0): string {
    if (group < 0 || group >= this.groups.length) {
      throw new LexError(
        `Token of type '${String(this.type)}' has no group ${group}`,
        this.location
      );
    }
    return this.groups[group];
  }

  toString(): string {
    if (this.groups.length === 0) {
      return "<nothing>";
    }
    return `<${String(this.type)}@${formatLocation(this.location)} (${this.groups.join(",")})>`;
  }
}
