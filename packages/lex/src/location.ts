/**
 * Source locations: line/column/offset coordinates into a named buffer.
 */

export interface Location {
  /** 1-based line number (0 for `nowhere()`) */
  readonly line: number;
  /** 1-based column number (0 for `nowhere()`) */
  readonly col: number;
  /** 0-based offset in UTF-16 code units */
  readonly offset: number;
  /** Name of the input (a file path, or "" for anonymous strings) */
  readonly name: string;
}

/** The location of the first character of an input. */
export function startOf(name = ""): Location {
  return { line: 1, col: 1, offset: 0, name };
}

/** Sentinel for "no location". */
export function nowhere(): Location {
  return { line: 0, col: 0, offset: 0, name: "" };
}

/** The location reached after consuming `text` from `loc`. */
export function advanceLocation(loc: Location, text: string): Location {
  let { line, col } = loc;
  for (const c of text) {
    if (c === "\n") {
      line++;
      col = 1;
    } else {
      col += c.length;
    }
  }
  return { line, col, offset: loc.offset + text.length, name: loc.name };
}

/** `name:line:col`, or `line:col` for anonymous input. */
export function formatLocation(loc: Location): string {
  return loc.name ? `${loc.name}:${loc.line}:${loc.col}` : `${loc.line}:${loc.col}`;
}
