import type { Samples, SolverOptions, VectorFitResult } from "@core-types";
import { assertDegree, DimensionMismatchError, EmptyInputError, LengthMismatchError } from "interp-core";
import { evaluatePolynomial, fitPolynomial } from "./polynomial.js";

export function assertVectors(x: Samples, vectors: readonly Samples[], tag: string): number {
  if (x.length !== vectors.length) {
    throw new LengthMismatchError(`${tag}: ${x.length} x values vs ${vectors.length} vectors`);
  }
  if (vectors.length === 0) {
    throw new EmptyInputError(`${tag}: no samples`);
  }
  const dimension = vectors[0].length;
  if (dimension === 0) {
    throw new DimensionMismatchError(`${tag}: vectors have zero dimension`);
  }
  vectors.forEach((v, i) => {
    if (v.length !== dimension) {
      throw new DimensionMismatchError(`${tag}: vector ${i} has dimension ${v.length}, expected ${dimension}`);
    }
  });
  return dimension;
}

/** Independent polynomial fit of each component against the shared x. */
export function fitVector(
  x: Samples,
  vectors: readonly Samples[],
  degree: number,
  opts: SolverOptions = {}
): VectorFitResult {
  const dimension = assertVectors(x, vectors, "fitVector");
  assertDegree(degree, "fitVector");

  const componentCoeffs = Array.from({ length: dimension }, (_, d) =>
    fitPolynomial(x, vectors.map(v => v[d]), degree, opts)
  );
  return { componentCoeffs, degree, dimension };
}

export function evaluateVector(result: VectorFitResult, x: number): number[] {
  return result.componentCoeffs.map(coeffs => evaluatePolynomial(coeffs, x));
}
