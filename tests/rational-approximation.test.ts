import { describe, it, expect } from "vitest";
import {
  bestRational,
  rationalize,
  formatRational,
  rationalToNumber,
  DEFAULT_MAX_DENOMINATOR,
  RationalOps,
} from "../src/index.js";

function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}

/** Smallest error any fraction with denominator up to `max` achieves. */
function bruteForceError(value: number, max: number): number {
  let best = Infinity;
  for (let q = 1; q <= max; q++) {
    best = Math.min(best, Math.abs(value - Math.round(value * q) / q));
  }
  return best;
}

describe("rationalize", () => {
  it("prints integers without a denominator", () => {
    expect(rationalize(5)).toBe("5");
    expect(rationalize(-3)).toBe("-3");
    expect(rationalize(0)).toBe("0");
    expect(rationalize(1e21)).toBe("1000000000000000000000");
  });

  it("recovers simple fractions", () => {
    expect(rationalize(0.75)).toBe("3/4");
    expect(rationalize(-0.75)).toBe("-3/4");
    expect(rationalize(1 / 3)).toBe("1/3");
    expect(rationalize(2 / 3)).toBe("2/3");
    expect(rationalize(0.5)).toBe("1/2");
  });

  it("respects the denominator bound", () => {
    expect(rationalize(Math.PI, 1000)).toBe("355/113");
    expect(rationalize(0.3333333, 1000)).toBe("1/3");
    expect(rationalize(0.7, 1)).toBe("1");
    expect(rationalize(0.3, 1)).toBe("0");
    expect(rationalize(1.5, 1)).toBe("1");
  });

  it("prefers the convergent when both candidates are equally close", () => {
    expect(rationalize(0.5, 1)).toBe("0");
  });

  it("drops the sign of a zero result", () => {
    expect(rationalize(-0.3, 1)).toBe("0");
    expect(rationalize(1e-13)).toBe("0");
  });

  it("prints non-finite values as themselves", () => {
    expect(rationalize(NaN)).toBe("NaN");
    expect(rationalize(-Infinity)).toBe("-Infinity");
  });

  it("rejects an invalid denominator bound", () => {
    expect(() => rationalize(0.5, 0)).toThrow(RangeError);
    expect(() => rationalize(0.5, 1.5)).toThrow(RangeError);
    expect(() => rationalize(NaN, -1)).toThrow(RangeError);
  });

  it("defaults to a bound of one million", () => {
    expect(DEFAULT_MAX_DENOMINATOR).toBe(1_000_000);
  });
});

describe("bestRational", () => {
  it("returns fractions in lowest terms", () => {
    expect(bestRational(0.75)).toEqual({ num: 3n, den: 4n });
    expect(bestRational(-2.5)).toEqual({ num: -5n, den: 2n });
  });

  it("finds the closest fraction under the bound", () => {
    const values = [Math.PI, Math.E, Math.SQRT2, -0.123456789, 0.61803398875, 7.0001];
    for (const max of [10, 100, 1000]) {
      for (const value of values) {
        const r = bestRational(value, max);
        expect(r.den).toBeGreaterThanOrEqual(1n);
        expect(r.den).toBeLessThanOrEqual(BigInt(max));
        expect(gcd(r.num, r.den)).toBe(1n);
        const error = Math.abs(value - RationalOps.toNumber(r));
        expect(error).toBeLessThanOrEqual(bruteForceError(value, max) + 1e-12);
      }
    }
  });

  it("throws for non-finite values", () => {
    expect(() => bestRational(Infinity)).toThrow(RangeError);
    expect(() => bestRational(NaN)).toThrow(RangeError);
  });
});

describe("formatRational", () => {
  it("omits a denominator of one", () => {
    expect(formatRational({ num: 7n, den: 1n })).toBe("7");
    expect(formatRational({ num: -1n, den: 3n })).toBe("-1/3");
  });

  it("converts back to a number", () => {
    expect(rationalToNumber({ num: 3n, den: 4n })).toBe(0.75);
  });
});
