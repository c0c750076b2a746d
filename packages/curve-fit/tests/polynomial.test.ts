import { describe, it, expect } from "vitest";
import {
  EmptyInputError,
  InsufficientPointsError,
  InvalidArgumentError,
  LengthMismatchError,
  SingularMatrixError,
} from "interp-core";
import { evaluatePolynomial, fitPolynomial, vandermonde } from "../src/polynomial.js";
import { polynomialErrorMetrics } from "../src/metrics.js";

describe("fitPolynomial", () => {
  it("recovers 1 + 2x + 3x² from noiseless samples", () => {
    const x = [0, 1, 2, 3, 4, 5];
    const y = x.map(v => 1 + 2 * v + 3 * v * v);
    const coeffs = fitPolynomial(x, y, 2);
    expect(coeffs).toHaveLength(3);
    expect(coeffs[0]).toBeCloseTo(1, 8);
    expect(coeffs[1]).toBeCloseTo(2, 8);
    expect(coeffs[2]).toBeCloseTo(3, 8);
    expect(polynomialErrorMetrics(x, y, coeffs).rSquared).toBeCloseTo(1, 10);
  });

  it("fits the quadratic through 1, 3, 7, 13, 21, 31", () => {
    // these samples lie on 1 + x + x²
    const x = [0, 1, 2, 3, 4, 5];
    const y = [1, 3, 7, 13, 21, 31];
    const coeffs = fitPolynomial(x, y, 2);
    expect(coeffs[0]).toBeCloseTo(1, 8);
    expect(coeffs[1]).toBeCloseTo(1, 8);
    expect(coeffs[2]).toBeCloseTo(1, 8);

    const m = polynomialErrorMetrics(x, y, coeffs);
    expect(m.rSquared).toBeCloseTo(1, 10);
    expect(m.maxError).toBeLessThan(1e-9);
  });

  it("degree 0 gives the mean", () => {
    const [c0] = fitPolynomial([1, 2, 3], [2, 4, 9], 0);
    expect(c0).toBeCloseTo(5, 12);
  });

  it("least-squares line through scattered points", () => {
    const [c0, c1] = fitPolynomial([0, 1, 2], [1, 2, 4], 1);
    expect(c0).toBeCloseTo(5 / 6, 12);
    expect(c1).toBeCloseTo(1.5, 12);
  });

  it("validates its inputs", () => {
    expect(() => fitPolynomial([0, 1], [0], 1)).toThrow(LengthMismatchError);
    expect(() => fitPolynomial([], [], 0)).toThrow(EmptyInputError);
    expect(() => fitPolynomial([0, 1], [0, 1], 2)).toThrow(InsufficientPointsError);
    expect(() => fitPolynomial([0, 1], [0, 1], -1)).toThrow(InvalidArgumentError);
    expect(() => fitPolynomial([0, 1], [0, 1], 0.5)).toThrow(InvalidArgumentError);
  });

  it("reports rank-deficient data as a singular system", () => {
    expect(() => fitPolynomial([1, 1, 1], [1, 2, 3], 2)).toThrow(SingularMatrixError);
  });

  it("passes the pivot tolerance to the solver", () => {
    const x = [0, 1, 2, 3, 4, 5];
    const y = [1, 3, 7, 13, 21, 31];
    expect(() => fitPolynomial(x, y, 2, { pivotTolerance: 1e6 })).toThrow(SingularMatrixError);
  });
});

describe("evaluatePolynomial", () => {
  it("sums the power series", () => {
    expect(evaluatePolynomial([1, 2, 3], 2)).toBe(17);
    expect(evaluatePolynomial([4], 123)).toBe(4);
  });

  it("is zero for no coefficients", () => {
    expect(evaluatePolynomial([], 5)).toBe(0);
  });
});

describe("vandermonde", () => {
  it("holds ascending powers per row", () => {
    expect(vandermonde([2, 3], 2)).toEqual([[1, 2, 4], [1, 3, 9]]);
  });
});
