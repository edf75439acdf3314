/**
 * Polynomial - univariate polynomials over real coefficients
 *
 * Polynomials are represented as arrays of coefficients where coeffs[i] is
 * the coefficient of x^i, so 12.8x^5 - 1.62x^2 + 33x - 7.31 is stored as
 * [-7.31, 33, -1.62, 0, 0, 12.8]. Every value is kept in canonical form
 * (see {@link canonicalize}) and carries a display name that arithmetic
 * composes from the names of its operands.
 *
 * @example
 * ```typescript
 * // p(x) = 1 + 2x + 3x²
 * const p = polynomial([1, 2, 3]);
 *
 * evaluate(p, 2); // 1 + 4 + 12 = 17
 *
 * const q = polynomial([1, 1], "q"); // 1 + x
 * addPoly(p, q); // 2 + 3x + 3x², named "(p + q)"
 * mulPoly(p, q); // 1 + 3x + 5x² + 3x³, named "(p * q)"
 * ```
 */

import { canonicalize, horner, EPSILON } from "./canonical.js";
import { UnsupportedOperationError } from "../errors.js";

// ============================================================================
// Type Definition
// ============================================================================

/**
 * A polynomial with real coefficients.
 * coeffs[i] is the coefficient of x^i; trailing zeros are never stored.
 * Build values with polynomial() or fromCoefficients(), never as literals,
 * so the coefficients are canonical.
 */
export interface Polynomial {
  readonly coeffs: readonly number[];
  readonly name: string;
}

/** Either side of a binary polynomial operation. */
export type Operand = Polynomial | number;

/** Name given to polynomials constructed without one. */
export const DEFAULT_NAME = "p";

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a polynomial from coefficients, constant term first.
 * The coefficients are copied and canonicalized.
 */
export function polynomial(coeffs: readonly number[], name: string = DEFAULT_NAME): Polynomial {
  return { coeffs: canonicalize(coeffs), name };
}

/**
 * Alias of {@link polynomial}.
 */
export const fromCoefficients = polynomial;

/**
 * Create the zero polynomial.
 */
export function zeroPoly(name: string = DEFAULT_NAME): Polynomial {
  return { coeffs: [], name };
}

/**
 * Create a constant polynomial c.
 */
export function constant(c: number, name: string = DEFAULT_NAME): Polynomial {
  return polynomial([c], name);
}

/**
 * Same coefficients, different name.
 */
export function withName(p: Polynomial, name: string): Polynomial {
  return { coeffs: p.coeffs, name };
}

/**
 * Same name, different coefficients.
 */
export function withCoefficients(p: Polynomial, coeffs: readonly number[]): Polynomial {
  return polynomial(coeffs, p.name);
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Get the degree of a polynomial.
 * The zero polynomial has degree -1 by convention.
 */
export function degree(p: Polynomial): number {
  return p.coeffs.length - 1;
}

/**
 * A copy of the coefficients, constant term first.
 */
export function coefficients(p: Polynomial): number[] {
  return [...p.coeffs];
}

/**
 * Check if the polynomial is zero.
 */
export function isZero(p: Polynomial): boolean {
  return p.coeffs.length === 0;
}

/**
 * Get the leading coefficient.
 * Returns undefined for the zero polynomial.
 */
export function leading(p: Polynomial): number | undefined {
  if (p.coeffs.length === 0) return undefined;
  return p.coeffs[p.coeffs.length - 1];
}

/**
 * Get the coefficient of x^n.
 */
export function coeff(p: Polynomial, n: number): number {
  if (n < 0 || n >= p.coeffs.length) return 0;
  return p.coeffs[n];
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Evaluate the polynomial at a point using Horner's method.
 * The zero polynomial evaluates to 0 everywhere.
 */
export function evaluate(p: Polynomial, x: number): number {
  return horner(p.coeffs, x);
}

// ============================================================================
// Helper Functions
// ============================================================================

function operandName(o: Operand): string {
  return typeof o === "number" ? String(o) : o.name;
}

function operandCoeffs(o: Operand): readonly number[] {
  return typeof o === "number" ? [o] : o.coeffs;
}

function composeName(a: Operand, op: string, b: Operand): string {
  return `(${operandName(a)} ${op} ${operandName(b)})`;
}

// Add f to the constant term, creating it for the zero polynomial.
function addToConstant(coeffs: readonly number[], f: number): number[] {
  const result = [...coeffs];
  if (result.length === 0) {
    result.push(0);
  }
  result[0] += f;
  return result;
}

// Coefficient-wise p + sign * q. Indices only q has are copied with the sign
// applied; indices only p has are copied unchanged.
function combine(p: readonly number[], q: readonly number[], sign: 1 | -1): number[] {
  const result: number[] = new Array<number>(Math.max(p.length, q.length)).fill(0);
  let i = 0;
  for (; i < p.length && i < q.length; i++) {
    result[i] = sign === 1 ? p[i] + q[i] : p[i] - q[i];
  }
  for (; i < p.length; i++) {
    result[i] = p[i];
  }
  for (; i < q.length; i++) {
    result[i] = sign === 1 ? q[i] : -q[i];
  }
  return result;
}

// Linear convolution of two coefficient sequences.
function convolve(p: readonly number[], q: readonly number[]): number[] {
  if (p.length === 0 || q.length === 0) {
    return [];
  }

  const last = p.length + q.length - 2;
  const result: number[] = new Array<number>(last + 1).fill(0);
  for (let n = 0; n <= last; n++) {
    for (let k = 0; k <= n; k++) {
      if (k < p.length && n - k < q.length) {
        result[n] += p[k] * q[n - k];
      }
    }
  }
  return result;
}

// ============================================================================
// Arithmetic Operations
// ============================================================================

/**
 * Add two polynomials, or a polynomial and a constant.
 * The degree of a polynomial sum is at most the greater of the two degrees.
 */
export function addPoly(p: Polynomial, q: Operand): Polynomial;
export function addPoly(f: number, p: Polynomial): Polynomial;
export function addPoly(a: Operand, b: Operand): Polynomial {
  const name = composeName(a, "+", b);
  if (typeof b === "number") {
    return polynomial(addToConstant(operandCoeffs(a), b), name);
  }
  if (typeof a === "number") {
    return polynomial(addToConstant(b.coeffs, a), name);
  }
  return polynomial(combine(a.coeffs, b.coeffs, 1), name);
}

/**
 * Subtract a polynomial or constant from a polynomial, or a polynomial from
 * a constant.
 */
export function subPoly(p: Polynomial, q: Operand): Polynomial;
export function subPoly(f: number, p: Polynomial): Polynomial;
export function subPoly(a: Operand, b: Operand): Polynomial {
  const name = composeName(a, "-", b);
  if (typeof b === "number") {
    return polynomial(addToConstant(operandCoeffs(a), -b), name);
  }
  if (typeof a === "number") {
    return polynomial(
      addToConstant(
        b.coeffs.map((c) => -c),
        a,
      ),
      name,
    );
  }
  return polynomial(combine(a.coeffs, b.coeffs, -1), name);
}

/**
 * Multiply two polynomials (convolution), or scale a polynomial by a constant.
 * For non-zero operands the degree of the product is the sum of the degrees,
 * unless the product's leading coefficient falls below the canonical epsilon.
 */
export function mulPoly(p: Polynomial, q: Operand): Polynomial;
export function mulPoly(f: number, p: Polynomial): Polynomial;
export function mulPoly(a: Operand, b: Operand): Polynomial {
  const name = composeName(a, "*", b);
  if (typeof b === "number") {
    return polynomial(
      operandCoeffs(a).map((c) => c * b),
      name,
    );
  }
  if (typeof a === "number") {
    return polynomial(
      b.coeffs.map((c) => a * c),
      name,
    );
  }
  return polynomial(convolve(a.coeffs, b.coeffs), name);
}

/**
 * Divide every coefficient by a constant.
 * Division by 0 follows IEEE semantics and yields infinities or NaN.
 */
export function divideByScalar(p: Polynomial, f: number): Polynomial {
  return polynomial(
    p.coeffs.map((c) => c / f),
    composeName(p, "/", f),
  );
}

/**
 * Division operator. Only a numeric divisor is defined; dividing by a
 * polynomial throws {@link UnsupportedOperationError}.
 */
export function dividePoly(dividend: Operand, divisor: Operand): Polynomial {
  if (typeof divisor !== "number") {
    throw new UnsupportedOperationError(
      "divide",
      `Cannot divide ${operandName(dividend)} by the polynomial ${divisor.name}; only division by a number is supported.`,
    );
  }
  const p = typeof dividend === "number" ? constant(dividend, String(dividend)) : dividend;
  return divideByScalar(p, divisor);
}

/**
 * Negate a polynomial.
 */
export function negatePoly(p: Polynomial): Polynomial {
  return polynomial(
    p.coeffs.map((c) => -c),
    `(-${p.name})`,
  );
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Check if two polynomials have the same coefficients, within a tolerance.
 * Names are not compared.
 */
export function equals(a: Polynomial, b: Polynomial, tolerance: number = EPSILON): boolean {
  if (a.coeffs.length !== b.coeffs.length) return false;
  for (let i = 0; i < a.coeffs.length; i++) {
    if (Math.abs(a.coeffs[i] - b.coeffs[i]) > tolerance) return false;
  }
  return true;
}
