import * as fs from "fs";

/**
 * Coordinates read from text. `query` holds a trailing number that had no
 * partner: the x-coordinate the caller should evaluate at.
 */
export interface PointSet {
  xs: number[];
  ys: number[];
  query: number | undefined;
}

/**
 * Read whitespace-separated numbers as x y pairs. Reading stops at the first
 * token that is not a number.
 *
 * @example
 * parsePoints("0 1\n1 2\n2 5\n3"); // { xs: [0, 1, 2], ys: [1, 2, 5], query: 3 }
 */
export function parsePoints(text: string): PointSet {
  const xs: number[] = [];
  const ys: number[] = [];
  let pending: number | undefined;

  for (const token of text.split(/\s+/)) {
    if (token === "") continue;
    const value = Number(token);
    if (Number.isNaN(value)) break;

    if (pending === undefined) {
      pending = value;
    } else {
      xs.push(pending);
      ys.push(value);
      pending = undefined;
    }
  }

  return { xs, ys, query: pending };
}

/**
 * Read points from a file, or from stdin when `file` is "-".
 */
export function readPoints(file: string): PointSet {
  const text = file === "-" ? fs.readFileSync(0, "utf-8") : fs.readFileSync(file, "utf-8");
  return parsePoints(text);
}
