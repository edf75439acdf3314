/**
 * Coefficient helpers shared by every polynomial operation.
 */

/** Coefficients with a magnitude at or below this are stored as exactly 0. */
export const EPSILON = 1e-10;

/**
 * Return the canonical form of a coefficient sequence: near-zero entries
 * become 0, then trailing zeros are dropped.
 *
 * @example
 * ```typescript
 * canonicalize([3.3, 1.97, 8, 0, 4.2, 0, 1e-17, 0]); // [3.3, 1.97, 8, 0, 4.2]
 * canonicalize([0, 0]);                              // []
 * ```
 */
export function canonicalize(coeffs: readonly number[]): number[] {
  const result = coeffs.map((c) => (Math.abs(c) <= EPSILON ? 0 : c));
  while (result.length > 0 && result[result.length - 1] === 0) {
    result.pop();
  }
  return result;
}

/**
 * Evaluate coefficients (constant term first) at x using Horner's method.
 *
 * 12.8x^5 - 1.62x^2 + 33x - 7.31 is computed as
 * ((((12.8x + 0)x + 0)x - 1.62)x + 33)x - 7.31.
 */
export function horner(coeffs: readonly number[], x: number): number {
  let result = 0;
  for (let i = coeffs.length - 1; i >= 0; i--) {
    result = result * x + coeffs[i];
  }
  return result;
}
