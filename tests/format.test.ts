import { describe, it, expect } from "vitest";
import {
  formatCoefficient,
  formatCoefficients,
  formatPolynomial,
  polynomial,
  zeroPoly,
  DEFAULT_PRECISION,
} from "../src/index.js";

describe("formatCoefficient", () => {
  it("rounds decimals to twelve significant digits", () => {
    expect(DEFAULT_PRECISION).toBe(12);
    expect(formatCoefficient(0.1 + 0.2)).toBe("0.3");
    expect(formatCoefficient(1 / 3)).toBe("0.333333333333");
    expect(formatCoefficient(10)).toBe("10");
    expect(formatCoefficient(1e21)).toBe("1e+21");
  });

  it("honours a custom precision", () => {
    expect(formatCoefficient(1 / 3, { precision: 4 })).toBe("0.3333");
  });

  it("prints -0 as 0", () => {
    expect(formatCoefficient(-0)).toBe("0");
  });

  it("prints non-finite values as themselves", () => {
    expect(formatCoefficient(Infinity)).toBe("Infinity");
    expect(formatCoefficient(NaN, { rational: true })).toBe("NaN");
  });

  it("prints fractions in rational mode", () => {
    expect(formatCoefficient(0.75, { rational: true })).toBe("3/4");
    expect(formatCoefficient(Math.PI, { rational: true, maxDenominator: 1000 })).toBe("355/113");
  });
});

describe("formatPolynomial", () => {
  it("prints the name and the coefficient list", () => {
    expect(formatPolynomial(polynomial([1, 0, 1]))).toBe("p ≡ [1, 0, 1]");
    expect(formatPolynomial(polynomial([0.5, 0.75], "f"), { rational: true })).toBe("f ≡ [1/2, 3/4]");
  });

  it("prints the zero polynomial as an empty list", () => {
    expect(formatPolynomial(zeroPoly())).toBe("p ≡ []");
  });

  it("prints coefficients without a name", () => {
    expect(formatCoefficients(polynomial([0.5, -2]))).toBe("[0.5, -2]");
  });
});
