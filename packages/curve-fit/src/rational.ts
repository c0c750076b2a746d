import type {
  PolynomialCoefficients,
  RationalFitOptions,
  RationalFitResult,
  Samples,
} from "@core-types";
import {
  assertDegree,
  assertSamples,
  EPS_DENOM,
  InsufficientPointsError,
  InvalidArgumentError,
  NearSingularDenominatorError,
  PIVOT_TOL,
  RATIONAL_MAX_ITER,
  RATIONAL_TOL,
} from "interp-core";
import { solveLeastSquares } from "./linalg.js";
import { evaluatePolynomial } from "./polynomial.js";
import { RationalFitOptionsSchema } from "./config/schema.js";
import { logDebug, warnOnce } from "./log.js";

export function evaluateRational(
  numerator: PolynomialCoefficients,
  denominator: PolynomialCoefficients,
  x: number
): number {
  const num = evaluatePolynomial(numerator, x);
  const den = evaluatePolynomial(denominator, x);
  if (Math.abs(den) < EPS_DENOM) {
    throw new NearSingularDenominatorError(`evaluateRational: |Q(${x})| = ${Math.abs(den)} below ${EPS_DENOM}`);
  }
  return num / den;
}

/** Q at every sample, with |Q| below EPS_DENOM replaced by EPS_DENOM. */
function clampedDenominator(den: PolynomialCoefficients, x: Samples): { q: number[]; clamped: number } {
  let clamped = 0;
  const q = x.map(xi => {
    const qi = evaluatePolynomial(den, xi);
    if (Math.abs(qi) < EPS_DENOM) {
      clamped++;
      return EPS_DENOM;
    }
    return qi;
  });
  return { q, clamped };
}

function sumSquaredError(x: Samples, y: Samples, num: PolynomialCoefficients, q: readonly number[]): number {
  let sse = 0;
  for (let i = 0; i < x.length; i++) {
    const e = y[i] - evaluatePolynomial(num, x[i]) / q[i];
    sse += e * e;
  }
  return sse;
}

function parseOptions(opts: RationalFitOptions): Required<RationalFitOptions> {
  const parsed = RationalFitOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(`fitRational: ${issue.path.join(".") || "options"}: ${issue.message}`);
  }
  return {
    maxIterations: parsed.data.maxIterations ?? RATIONAL_MAX_ITER,
    tolerance: parsed.data.tolerance ?? RATIONAL_TOL,
    pivotTolerance: parsed.data.pivotTolerance ?? PIVOT_TOL,
  };
}

/**
 * Fit y ≈ P(x)/Q(x) by iteratively reweighted linear least squares.
 *
 * Each pass linearizes y·Q(x) = P(x) and weights every row by 1/Q_prev(x),
 * where Q_prev is the previous pass's denominator. The constant term of Q
 * is pinned to 1, otherwise P = Q = 0 solves the linearized system.
 * Denominator values that vanish at a sample are clamped, both in the next
 * pass's weights and in the pass's SSE. A clamped row dominates the normal
 * equations, so such a fit usually ends in SingularMatrixError.
 */
export function fitRational(
  x: Samples,
  y: Samples,
  numDegree: number,
  denDegree: number,
  opts: RationalFitOptions = {}
): RationalFitResult {
  assertSamples(x, y, "fitRational");
  assertDegree(numDegree, "fitRational.numDegree");
  assertDegree(denDegree, "fitRational.denDegree");
  const { maxIterations, tolerance, pivotTolerance } = parseOptions(opts);

  const n = x.length;
  const totalParams = numDegree + denDegree + 1;
  if (n < totalParams) {
    throw new InsufficientPointsError(
      `fitRational: ${n} points for ${totalParams} free parameters`
    );
  }

  let num: number[] = new Array(numDegree + 1).fill(0);
  let den: number[] = new Array(denDegree + 1).fill(0);
  den[0] = 1;

  let prevSSE = Infinity;
  let sse = Infinity;
  let converged = false;
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations++;

    const { q, clamped } = clampedDenominator(den, x);
    if (clamped > 0) {
      logDebug("rational", `pass ${iterations}: clamped ${clamped} near-zero denominator value(s)`);
    }

    const design = x.map((xi, i) => {
      const row: number[] = new Array(totalParams);
      for (let j = 0; j <= numDegree; j++) {
        row[j] = Math.pow(xi, j) / q[i];
      }
      for (let j = 1; j <= denDegree; j++) {
        row[numDegree + j] = -y[i] * Math.pow(xi, j) / q[i];
      }
      return row;
    });
    const target = y.map((yi, i) => yi / q[i]);

    const params = solveLeastSquares(design, target, pivotTolerance);
    num = params.slice(0, numDegree + 1);
    den = [1, ...params.slice(numDegree + 1)];

    sse = sumSquaredError(x, y, num, clampedDenominator(den, x).q);
    if (Math.abs(prevSSE - sse) < tolerance) {
      converged = true;
      break;
    }
    prevSSE = sse;
  }

  if (!converged) {
    warnOnce(
      "rational",
      `no convergence after ${maxIterations} passes (SSE ${sse.toExponential(3)}, tolerance ${tolerance})`
    );
  }

  return {
    numerator: num,
    denominator: den,
    numeratorDegree: numDegree,
    denominatorDegree: denDegree,
    iterations,
    converged,
    sse,
  };
}
