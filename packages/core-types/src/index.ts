export type Samples = readonly number[];

/** Coefficient of x^k at index k (low to high degree). */
export type PolynomialCoefficients = readonly number[];

export type Predictor = (x: number) => number;

/** table[i][j] is the value at (xGrid[i], yGrid[j]) */
export type GridValues = readonly (readonly number[])[];

export interface SolverOptions {
  /** pivot magnitude below which the normal equations count as singular */
  pivotTolerance?: number;
}

export interface RationalFitOptions extends SolverOptions {
  maxIterations?: number;
  /** stop when the SSE changes by less than this between passes */
  tolerance?: number;
}

export interface RationalFitResult {
  readonly numerator: PolynomialCoefficients;
  /** denominator[0] is always 1 */
  readonly denominator: PolynomialCoefficients;
  readonly numeratorDegree: number;
  readonly denominatorDegree: number;
  readonly iterations: number;
  readonly converged: boolean;
  readonly sse: number;
}

export interface VectorFitResult {
  readonly componentCoeffs: readonly PolynomialCoefficients[];
  readonly degree: number;
  readonly dimension: number;
}

export interface FitErrorMetrics {
  readonly rSquared: number;
  readonly rmse: number;
  readonly mae: number;
  readonly maxError: number;
  /** percentage, over samples with non-negligible |y| */
  readonly meanRelativeError: number;
  readonly sse: number;
}

// Config types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
