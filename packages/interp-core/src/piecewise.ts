import type { GridValues, Samples } from "@core-types";
import { findInsertionPoint } from "./search.js";
import { DimensionMismatchError, EmptyInputError } from "./errors.js";
import { assertPositive, assertSamples } from "./utils.js";

// Every interpolator here clamps to the end values: no extrapolation.

export function linearBetween(x0: number, y0: number, x1: number, y1: number, x: number): number {
  return y0 + (y1 - y0) * (x - x0) / (x1 - x0);
}

function linearUnchecked(x: Samples, y: Samples, xq: number): number {
  const n = x.length;
  if (n === 1) return y[0];
  if (xq <= x[0]) return y[0];
  if (xq >= x[n - 1]) return y[n - 1];

  const i = findInsertionPoint(x, xq);
  if (i === 0) return y[0];
  if (i >= n) return y[n - 1];
  return linearBetween(x[i - 1], y[i - 1], x[i], y[i], xq);
}

export function linear(x: Samples, y: Samples, xq: number): number {
  assertSamples(x, y, "linear");
  return linearUnchecked(x, y, xq);
}

export function batchLinear(x: Samples, y: Samples, targets: Samples): number[] {
  assertSamples(x, y, "batchLinear");
  return targets.map(xq => linearUnchecked(x, y, xq));
}

/** Linear in log10(f); meant for dB-vs-frequency tables. */
export function logLinear(freq: Samples, valueDb: Samples, targetFreq: number): number {
  assertPositive(targetFreq, "logLinear.targetFreq");
  assertSamples(freq, valueDb, "logLinear");
  const logFreq = freq.map((f, i) => {
    assertPositive(f, `logLinear.freq[${i}]`);
    return Math.log10(f);
  });
  return linearUnchecked(logFreq, valueDb, Math.log10(targetFreq));
}

export function nearest(x: Samples, y: Samples, xq: number): number {
  assertSamples(x, y, "nearest");
  const n = x.length;
  if (xq <= x[0]) return y[0];
  if (xq >= x[n - 1]) return y[n - 1];

  const i = findInsertionPoint(x, xq);
  if (i === 0) return y[0];
  if (i >= n) return y[n - 1];

  const leftDist = xq - x[i - 1];
  const rightDist = x[i] - xq;
  return leftDist <= rightDist ? y[i - 1] : y[i];
}

/**
 * 2D interpolation over table[i][j] at (xGrid[i], yGrid[j]).
 * Off the grid on one axis it falls back to 1D along the nearest edge.
 */
export function bilinear(
  xGrid: Samples,
  yGrid: Samples,
  table: GridValues,
  x: number,
  y: number
): number {
  if (xGrid.length === 0 || yGrid.length === 0) {
    throw new EmptyInputError("bilinear: grid is empty");
  }
  if (table.length !== xGrid.length) {
    throw new DimensionMismatchError(
      `bilinear: table has ${table.length} rows, xGrid has ${xGrid.length} points`
    );
  }
  table.forEach((row, r) => {
    if (row.length !== yGrid.length) {
      throw new DimensionMismatchError(
        `bilinear: row ${r} has ${row.length} values, yGrid has ${yGrid.length} points`
      );
    }
  });

  const nx = xGrid.length;
  const ny = yGrid.length;

  if (x <= xGrid[0]) return linearUnchecked(yGrid, table[0], y);
  if (x >= xGrid[nx - 1]) return linearUnchecked(yGrid, table[nx - 1], y);
  if (y <= yGrid[0]) return linearUnchecked(xGrid, table.map(row => row[0]), x);
  if (y >= yGrid[ny - 1]) return linearUnchecked(xGrid, table.map(row => row[ny - 1]), x);

  // lower-left corner of the cell
  const i = findInsertionPoint(xGrid, x) - 1;
  const j = findInsertionPoint(yGrid, y) - 1;

  const x0 = xGrid[i], x1 = xGrid[i + 1];
  const y0 = yGrid[j], y1 = yGrid[j + 1];

  const z00 = table[i][j];
  const z10 = table[i + 1][j];
  const z01 = table[i][j + 1];
  const z11 = table[i + 1][j + 1];

  const tx = (x - x0) / (x1 - x0);
  const ty = (y - y0) / (y1 - y0);

  const z0 = z00 * (1 - tx) + z10 * tx;
  const z1 = z01 * (1 - tx) + z11 * tx;
  return z0 * (1 - ty) + z1 * ty;
}
