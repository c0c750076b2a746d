import type { PolynomialCoefficients, Samples, SolverOptions } from "@core-types";
import { assertDegree, assertSamples, InsufficientPointsError, PIVOT_TOL } from "interp-core";
import { solveLeastSquares } from "./linalg.js";

/** Vandermonde design matrix: A[i][j] = x[i]^j, j = 0..degree */
export function vandermonde(x: Samples, degree: number): number[][] {
  return x.map(xi => Array.from({ length: degree + 1 }, (_, j) => Math.pow(xi, j)));
}

/** Least-squares polynomial through (x, y), coefficients low to high degree. */
export function fitPolynomial(
  x: Samples,
  y: Samples,
  degree: number,
  opts: SolverOptions = {}
): number[] {
  assertSamples(x, y, "fitPolynomial");
  assertDegree(degree, "fitPolynomial");
  if (x.length < degree + 1) {
    throw new InsufficientPointsError(
      `fitPolynomial: ${x.length} points cannot determine a degree-${degree} polynomial (need ${degree + 1})`
    );
  }
  return solveLeastSquares(vandermonde(x, degree), y, opts.pivotTolerance ?? PIVOT_TOL);
}

export function evaluatePolynomial(coeffs: PolynomialCoefficients, x: number): number {
  let result = 0;
  for (let k = 0; k < coeffs.length; k++) {
    result += coeffs[k] * Math.pow(x, k);
  }
  return result;
}
