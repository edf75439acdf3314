/**
 * Lagrange Interpolation
 *
 * Builds the unique polynomial of minimal degree through a set of points as
 * a sum of basis polynomials, each equal to 1 at one point and 0 at the
 * others. The basis terms are assembled from ordinary polynomial products
 * and scalar divisions:
 *
 *   L(x) = Σ_i y_i · Π_{k≠i} (x - x_k) / (x_i - x_k)
 *
 * That costs O(n³) scalar multiplications for n points.
 *
 * @example
 * ```typescript
 * const p = interpolate([0, 1, 2], [1, 2, 5]);
 * p.coeffs;        // [1, 0, 1], i.e. x² + 1
 * evaluate(p, 3);  // 10
 * ```
 */

import { InvalidInputError } from "../errors.js";
import {
  type Polynomial,
  addPoly,
  constant,
  divideByScalar,
  mulPoly,
  polynomial,
  withName,
  zeroPoly,
} from "../types/polynomial.js";

/** Name given to every interpolating polynomial. */
export const INTERPOLATION_NAME = "ip";

/** A point in the plane. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Find the interpolating polynomial through the points (xs[i], ys[i]).
 * If the arrays differ in length, the extra values at the end of the longer
 * one are ignored for the sum, but every x-value must still be distinct.
 *
 * @throws InvalidInputError if fewer than two points are given or two points
 *   share an x-coordinate
 */
export function interpolate(xs: readonly number[], ys: readonly number[]): Polynomial {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) {
    throw new InvalidInputError(
      "too_few_points",
      `At least two points are required for interpolation, got ${n}.`,
    );
  }

  const seen = new Set<number>();
  for (const x of xs) {
    if (seen.has(x)) {
      throw new InvalidInputError(
        "duplicate_x",
        `Expected distinct x-coordinates, but ${x} occurs multiple times.`,
      );
    }
    seen.add(x);
  }

  let result = zeroPoly();
  for (let i = 0; i < n; i++) {
    let term = constant(ys[i]);
    for (let k = 0; k < n; k++) {
      if (k === i) {
        continue;
      }
      term = divideByScalar(mulPoly(term, polynomial([-xs[k], 1])), xs[i] - xs[k]);
    }
    result = addPoly(result, term);
  }
  return withName(result, INTERPOLATION_NAME);
}

/**
 * {@link interpolate} over a list of points.
 */
export function interpolatePoints(points: readonly Point[]): Polynomial {
  return interpolate(
    points.map((p) => p.x),
    points.map((p) => p.y),
  );
}
