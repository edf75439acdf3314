/**
 * lagrange: Polynomials, Lagrange interpolation and rational approximation
 *
 * This package provides:
 * - **Polynomial**: canonical real-coefficient polynomials with Horner
 *   evaluation and arithmetic
 * - **Interpolation**: the Lagrange polynomial through a set of points
 * - **Rational approximation**: best fraction under a denominator bound
 * - **Formatting and configuration** used by the `lagrange` CLI
 *
 * @example
 * ```typescript
 * import { interpolate, evaluate, formatPolynomial } from "lagrange";
 *
 * const p = interpolate([0, 1, 2], [1, 2, 5]);
 * evaluate(p, 3);                                 // 10
 * formatPolynomial(p);                            // "ip ≡ [1, 0, 1]"
 * formatPolynomial(p, { rational: true });        // "ip ≡ [1, 0, 1]"
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Polynomials
// ============================================================================

export {
  // Type
  type Polynomial,
  type Operand,
  DEFAULT_NAME,
  // Constructors
  polynomial,
  fromCoefficients,
  zeroPoly,
  constant,
  withName,
  withCoefficients,
  // Queries
  degree,
  coefficients,
  isZero,
  leading,
  coeff,
  evaluate,
  // Arithmetic
  addPoly,
  subPoly,
  mulPoly,
  divideByScalar,
  dividePoly,
  negatePoly,
  equals as polyEquals,
} from "./types/polynomial.js";

export { EPSILON, canonicalize, horner } from "./types/canonical.js";

// ============================================================================
// Rational Approximation
// ============================================================================

export {
  type RationalApproximation,
  DEFAULT_MAX_DENOMINATOR,
  SCALE,
  bestRational,
  rationalize,
  formatRational,
  toNumber as rationalToNumber,
} from "./types/rational-approximation.js";

// ============================================================================
// Interpolation
// ============================================================================

export {
  type Point,
  INTERPOLATION_NAME,
  interpolate,
  interpolatePoints,
} from "./interpolation/lagrange.js";

// ============================================================================
// Errors
// ============================================================================

export {
  type InvalidInputReason,
  InvalidInputError,
  UnsupportedOperationError,
  UsageError,
} from "./errors.js";

// ============================================================================
// Formatting & Configuration
// ============================================================================

export {
  type FormatOptions,
  DEFAULT_PRECISION,
  formatCoefficient,
  formatCoefficients,
  formatPolynomial,
} from "./format/polynomial.js";

export {
  type LagrangeConfig,
  type ResolvedConfig,
  type LoadOptions,
  config,
  defineConfig,
  envName,
} from "./core/config.js";

// Namespaced access, e.g. PolyOps.fromCoefficients([1, 2])
export * as PolyOps from "./types/polynomial.js";
export * as RationalOps from "./types/rational-approximation.js";
