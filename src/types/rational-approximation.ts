/**
 * Rational Approximation
 *
 * Best rational approximation of a floating-point number under a bound on
 * the denominator, found from the continued-fraction convergents of the
 * number and the last admissible semiconvergent. All integer work is done
 * in bigint so no intermediate product can overflow.
 *
 * @example
 * ```typescript
 * rationalize(0.75);           // "3/4"
 * rationalize(-3);             // "-3"
 * rationalize(Math.PI, 1000);  // "355/113"
 * ```
 */

/**
 * A fraction num/den.
 * Invariants:
 * - den > 0
 * - gcd(|num|, den) = 1
 */
export interface RationalApproximation {
  readonly num: bigint;
  readonly den: bigint;
}

export const DEFAULT_MAX_DENOMINATOR = 1_000_000;

/**
 * Fixed scale for the initial approximation |value| ≈ N / SCALE. 10^12 keeps
 * twelve decimal places, which covers what a double carries for coefficients
 * of moderate magnitude.
 */
export const SCALE = 10n ** 12n;

/**
 * Compute GCD of two bigints using Euclidean algorithm.
 */
function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

function checkMaxDenominator(maxDenominator: number): bigint {
  if (!Number.isSafeInteger(maxDenominator) || maxDenominator < 1) {
    throw new RangeError(
      `maxDenominator must be a positive integer, got ${maxDenominator}`,
    );
  }
  return BigInt(maxDenominator);
}

/**
 * Find the fraction closest to `value` whose denominator does not exceed
 * `maxDenominator`. Of two equally close candidates, the one with the
 * smaller denominator wins.
 *
 * @throws RangeError if `value` is not finite or `maxDenominator` is not a
 *   positive integer
 */
export function bestRational(
  value: number,
  maxDenominator: number = DEFAULT_MAX_DENOMINATOR,
): RationalApproximation {
  const max = checkMaxDenominator(maxDenominator);
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot approximate ${value} by a fraction`);
  }

  if (Math.trunc(value) === value) {
    return { num: BigInt(value), den: 1n };
  }

  const negative = value < 0;
  const magnitude = Math.abs(value);
  const signed = (num: bigint, den: bigint): RationalApproximation => ({
    num: negative && num !== 0n ? -num : num,
    den,
  });

  // Initial approximation with a large denominator, in lowest terms.
  let n = BigInt(Math.round(magnitude * Number(SCALE)));
  let d = SCALE;
  const g = gcd(n, d);
  n /= g;
  d /= g;
  if (d <= max) {
    return signed(n, d);
  }

  // The value every candidate is measured against.
  const targetNum = n;
  const targetDen = d;

  // Convergents p0/q0 and p1/q1. q1 increases strictly on every pass and the
  // expansion of n/d ends on a denominator above max, so the loop exits.
  let p0 = 0n;
  let q0 = 1n;
  let p1 = 1n;
  let q1 = 0n;
  for (;;) {
    const a = n / d;
    const q2 = q0 + a * q1;
    if (q2 > max) {
      break;
    }

    const p1Old = p1;
    const q1Old = q1;
    p1 = p0 + a * p1;
    q1 = q2;
    p0 = p1Old;
    q0 = q1Old;

    const dOld = d;
    d = n - a * d;
    n = dOld;
  }

  // Largest semiconvergent that still fits under the bound.
  const k = (max - q0) / q1;
  const boundNum = p0 + k * p1;
  const boundDen = q0 + k * q1;

  // |p/q - t/u| compared as |p*u - t*q| / (q*u); the common factor u cancels.
  const convergentError = abs(p1 * targetDen - targetNum * q1) * boundDen;
  const boundError = abs(boundNum * targetDen - targetNum * boundDen) * q1;

  if (convergentError <= boundError) {
    return signed(p1, q1);
  }
  return signed(boundNum, boundDen);
}

/**
 * Render a fraction as "num" or "num/den".
 */
export function formatRational(r: RationalApproximation): string {
  return r.den === 1n ? r.num.toString() : `${r.num}/${r.den}`;
}

/**
 * Approximate a number by a fraction with a bounded denominator and render
 * it. Integers print without a denominator; NaN and infinities print as
 * themselves.
 */
export function rationalize(
  value: number,
  maxDenominator: number = DEFAULT_MAX_DENOMINATOR,
): string {
  if (!Number.isFinite(value)) {
    checkMaxDenominator(maxDenominator);
    return String(value);
  }
  return formatRational(bestRational(value, maxDenominator));
}

/**
 * Value of a fraction as a number.
 */
export function toNumber(r: RationalApproximation): number {
  return Number(r.num) / Number(r.den);
}
