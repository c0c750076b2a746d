/**
 * Dense linear algebra for least-squares fits.
 * Systems are sized by the parameter count (d < 20), not by the data.
 */

import {
  DimensionMismatchError,
  PIVOT_TOL,
  SingularMatrixError,
} from "interp-core";

export type Matrix = readonly (readonly number[])[];

// ============================================================================
// Normal equations
// ============================================================================

/**
 * AᵀA and Aᵀb for an n×m design matrix A and target b.
 */
export function normalEquations(
  A: Matrix,
  b: readonly number[]
): { AtA: number[][]; Atb: number[] } {
  if (A.length !== b.length) {
    throw new DimensionMismatchError(
      `normalEquations: ${A.length} design rows vs ${b.length} targets`
    );
  }
  const m = A.length === 0 ? 0 : A[0].length;

  const AtA: number[][] = Array.from({ length: m }, () => new Array(m).fill(0));
  const Atb: number[] = new Array(m).fill(0);

  for (let k = 0; k < A.length; k++) {
    const row = A[k];
    if (row.length !== m) {
      throw new DimensionMismatchError(`normalEquations: row ${k} has ${row.length} columns, expected ${m}`);
    }
    for (let i = 0; i < m; i++) {
      Atb[i] += row[i] * b[k];
      for (let j = 0; j < m; j++) {
        AtA[i][j] += row[i] * row[j];
      }
    }
  }
  return { AtA, Atb };
}

// ============================================================================
// Gaussian elimination
// ============================================================================

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting.
 * Throws SingularMatrixError when a pivot falls below `pivotTol`.
 */
export function solveLinearSystem(
  A: Matrix,
  b: readonly number[],
  pivotTol: number = PIVOT_TOL
): number[] {
  const n = b.length;
  if (A.length !== n) {
    throw new DimensionMismatchError(`solveLinearSystem: ${A.length}×? matrix vs ${n} right-hand side`);
  }

  // augmented copy [A | b]
  const aug: number[][] = A.map((row, i) => {
    if (row.length !== n) {
      throw new DimensionMismatchError(`solveLinearSystem: row ${i} has ${row.length} columns, expected ${n}`);
    }
    return [...row, b[i]];
  });

  for (let i = 0; i < n; i++) {
    let maxRow = i;
    for (let k = i + 1; k < n; k++) {
      if (Math.abs(aug[k][i]) > Math.abs(aug[maxRow][i])) maxRow = k;
    }
    if (maxRow !== i) {
      const tmp = aug[i];
      aug[i] = aug[maxRow];
      aug[maxRow] = tmp;
    }

    const pivot = aug[i][i];
    if (Math.abs(pivot) < pivotTol) {
      throw new SingularMatrixError(
        `solveLinearSystem: pivot ${pivot} at column ${i} below ${pivotTol}`
      );
    }

    for (let k = i + 1; k < n; k++) {
      const factor = aug[k][i] / pivot;
      for (let j = i; j <= n; j++) {
        aug[k][j] -= factor * aug[i][j];
      }
    }
  }

  const x: number[] = new Array(n).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    let sum = aug[i][n];
    for (let j = i + 1; j < n; j++) {
      sum -= aug[i][j] * x[j];
    }
    x[i] = sum / aug[i][i];
  }
  return x;
}

/** Least-squares solution of the overdetermined system A·x ≈ b. */
export function solveLeastSquares(
  A: Matrix,
  b: readonly number[],
  pivotTol: number = PIVOT_TOL
): number[] {
  const { AtA, Atb } = normalEquations(A, b);
  return solveLinearSystem(AtA, Atb, pivotTol);
}
