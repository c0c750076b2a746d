import type {
  FitErrorMetrics,
  PolynomialCoefficients,
  Predictor,
  RationalFitResult,
  Samples,
  VectorFitResult,
} from "@core-types";
import { assertSamples, DimensionMismatchError, EPS_RELATIVE, EPS_SS_TOTAL } from "interp-core";
import { evaluatePolynomial } from "./polynomial.js";
import { evaluateRational } from "./rational.js";
import { assertVectors, evaluateVector } from "./vector.js";

/** Goodness of fit of `predict` against the reference samples. */
export function computeErrorMetrics(x: Samples, y: Samples, predict: Predictor): FitErrorMetrics {
  assertSamples(x, y, "computeErrorMetrics");
  const n = x.length;
  const yMean = y.reduce((s, v) => s + v, 0) / n;

  let sse = 0, sae = 0, maxError = 0, ssTotal = 0;
  let sumRel = 0, relCount = 0;

  for (let i = 0; i < n; i++) {
    const e = y[i] - predict(x[i]);
    const a = Math.abs(e);
    sse += e * e;
    sae += a;
    maxError = Math.max(maxError, a);
    ssTotal += (y[i] - yMean) ** 2;

    if (Math.abs(y[i]) > EPS_RELATIVE) {
      sumRel += a / Math.abs(y[i]);
      relCount++;
    }
  }

  return {
    rSquared: ssTotal < EPS_SS_TOTAL ? 1 : 1 - sse / ssTotal,
    rmse: Math.sqrt(sse / n),
    mae: sae / n,
    maxError,
    meanRelativeError: relCount > 0 ? (sumRel / relCount) * 100 : 0,
    sse,
  };
}

export function polynomialErrorMetrics(x: Samples, y: Samples, coeffs: PolynomialCoefficients): FitErrorMetrics {
  return computeErrorMetrics(x, y, xi => evaluatePolynomial(coeffs, xi));
}

export function rationalErrorMetrics(x: Samples, y: Samples, result: RationalFitResult): FitErrorMetrics {
  return computeErrorMetrics(x, y, xi => evaluateRational(result.numerator, result.denominator, xi));
}

/**
 * Metrics pooled over every component of every sample. R² is taken against
 * per-component means; relative error is not defined here and reported as 0.
 */
export function computeVectorErrorMetrics(
  x: Samples,
  vectors: readonly Samples[],
  result: VectorFitResult
): FitErrorMetrics {
  const dim = assertVectors(x, vectors, "computeVectorErrorMetrics");
  if (dim !== result.dimension) {
    throw new DimensionMismatchError(
      `computeVectorErrorMetrics: samples have dimension ${dim}, fit has ${result.dimension}`
    );
  }
  const n = x.length;

  const means = Array.from({ length: dim }, (_, d) =>
    vectors.reduce((s, v) => s + v[d], 0) / n
  );

  let sse = 0, sae = 0, maxError = 0, ssTotal = 0;
  for (let i = 0; i < n; i++) {
    const predicted = evaluateVector(result, x[i]);
    for (let d = 0; d < dim; d++) {
      const e = vectors[i][d] - predicted[d];
      const a = Math.abs(e);
      sse += e * e;
      sae += a;
      maxError = Math.max(maxError, a);
      ssTotal += (vectors[i][d] - means[d]) ** 2;
    }
  }

  const count = n * dim;
  return {
    rSquared: ssTotal < EPS_SS_TOTAL ? 1 : 1 - sse / ssTotal,
    rmse: Math.sqrt(sse / count),
    mae: sae / count,
    maxError,
    meanRelativeError: 0,
    sse,
  };
}

export function formatErrorMetrics(m: FitErrorMetrics): string {
  return `R² = ${m.rSquared.toFixed(6)}, RMSE = ${m.rmse.toFixed(6)}, MAE = ${m.mae.toFixed(6)}, MaxError = ${m.maxError.toFixed(6)}`;
}
