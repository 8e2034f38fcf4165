/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` — assertion for programmer errors
 * - `unreachable(value?)` — mark impossible code paths
 *
 * Both throw `InvariantError`. These report bugs in the calling code (a
 * malformed grammar, an impossible state), never bad input, so nothing in
 * sublex catches them.
 *
 * @example
 * ```typescript
 * invariant(rule.action === "push", "Only push rules have a target");
 *
 * switch (action) {
 *   case "ignore": ...
 *   case "match": ...
 *   default: unreachable(action);
 * }
 * ```
 */

/** Thrown when an invariant of the calling code is violated. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
 * Runtime invariant check.
 *
 * @throws InvariantError if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param value - A value of type `never` (for type-level exhaustiveness)
 */
export function unreachable(value?: never): never {
  throw new InvariantError(
    value === undefined ? "Unreachable code reached" : `Unreachable code reached with ${String(value)}`
  );
}
