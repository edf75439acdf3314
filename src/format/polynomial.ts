/**
 * Text rendering of polynomials. Every function here returns a string; the
 * caller decides where it goes.
 */

import type { Polynomial } from "../types/polynomial.js";
import { DEFAULT_MAX_DENOMINATOR, rationalize } from "../types/rational-approximation.js";

export interface FormatOptions {
  /** Print coefficients as fractions instead of decimals */
  rational?: boolean;
  /** Largest denominator a fraction may use (rational output only) */
  maxDenominator?: number;
  /** Significant digits of decimal output */
  precision?: number;
}

export const DEFAULT_PRECISION = 12;

/**
 * Render a single coefficient.
 *
 * @example
 * formatCoefficient(0.1 + 0.2);                    // "0.3"
 * formatCoefficient(0.75, { rational: true });     // "3/4"
 */
export function formatCoefficient(c: number, options: FormatOptions = {}): string {
  if (options.rational) {
    return rationalize(c, options.maxDenominator ?? DEFAULT_MAX_DENOMINATOR);
  }
  if (!Number.isFinite(c)) {
    return String(c);
  }
  return String(Number(c.toPrecision(options.precision ?? DEFAULT_PRECISION)));
}

/**
 * Render the coefficient list, constant term first: "[1, 0, 1]".
 */
export function formatCoefficients(p: Polynomial, options: FormatOptions = {}): string {
  return `[${p.coeffs.map((c) => formatCoefficient(c, options)).join(", ")}]`;
}

/**
 * Render a polynomial with its name: "p ≡ [1, 0, 1]".
 */
export function formatPolynomial(p: Polynomial, options: FormatOptions = {}): string {
  return `${p.name} ≡ ${formatCoefficients(p, options)}`;
}
