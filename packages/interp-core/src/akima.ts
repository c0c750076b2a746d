import type { Samples } from "@core-types";
import { findInsertionPoint } from "./search.js";
import { InsufficientPointsError } from "./errors.js";
import { assertSameLength } from "./utils.js";
import { AKIMA_LARGE_WEIGHT, AKIMA_MIN_POINTS, AKIMA_WEIGHT_EPS } from "./constants.js";

/**
 * Segment weight. `undefined` marks an unbounded weight: the neighbouring
 * segment does not exist, or the slope pattern around it is degenerate.
 */
type Weight = number | undefined;

function segmentWeights(absSlope: number[]): Weight[] {
  const m = absSlope.length;
  return absSlope.map((s1, i) => {
    const s0 = i > 0 ? absSlope[i - 1] : s1;
    const s2 = i < m - 1 ? absSlope[i + 1] : s1;
    const s3 = i < m - 2 ? absSlope[i + 2] : s2;
    if (s1 === s0 || s2 === s3) return undefined;
    const w = (s0 + s1) / (s1 + s2);
    return Number.isFinite(w) ? w : undefined;
  });
}

/**
 * Derivative at knot i from the slopes on either side. w1 belongs to
 * segment i, w2 to segment i + 1.
 */
function knotDerivative(left: number, right: number, w1: Weight, w2: Weight): number {
  if (w1 === undefined) return left;
  if (w2 === undefined) return right;
  if (Math.abs(w2 - w1) < AKIMA_WEIGHT_EPS) {
    return w1 > AKIMA_LARGE_WEIGHT ? left : right;
  }
  return (w1 * left + w2 * right) / (w1 + w2);
}

/**
 * Akima cubic interpolant. Follows abrupt slope changes in measurement
 * tables without the ringing of a natural cubic spline.
 */
export class AkimaSpline {
  private readonly x: number[];
  private readonly y: number[];
  private readonly b: number[];
  private readonly c: number[];
  private readonly d: number[];

  constructor(x: Samples, y: Samples) {
    if (x.length < AKIMA_MIN_POINTS) {
      throw new InsufficientPointsError(
        `Akima spline requires at least ${AKIMA_MIN_POINTS} points, got ${x.length}`
      );
    }
    assertSameLength(x, y, "AkimaSpline");

    const n = x.length;
    this.x = [...x];
    this.y = [...y];

    const slope = Array.from({ length: n - 1 }, (_, i) =>
      (this.y[i + 1] - this.y[i]) / (this.x[i + 1] - this.x[i])
    );
    const weight = segmentWeights(slope.map(Math.abs));

    // slope[-1] and slope[n-1] clamp to the edge segments
    const slopeAt = (i: number) => slope[Math.min(Math.max(i, 0), n - 2)];
    const weightAt = (i: number): Weight => (i >= 0 && i < n - 1 ? weight[i] : undefined);

    const deriv = Array.from({ length: n }, (_, i) =>
      knotDerivative(slopeAt(i - 1), slopeAt(i), weightAt(i), weightAt(i + 1))
    );

    this.b = new Array(n - 1);
    this.c = new Array(n - 1);
    this.d = new Array(n - 1);
    for (let i = 0; i < n - 1; i++) {
      const h = this.x[i + 1] - this.x[i];
      const s = slope[i];
      const p = deriv[i];
      const q = deriv[i + 1];
      this.b[i] = p;
      this.c[i] = (3 * s - 2 * p - q) / h;
      this.d[i] = (p + q - 2 * s) / (h * h);
    }
  }

  get knotCount(): number {
    return this.x.length;
  }

  /** Per-segment cubic coefficients (copies). */
  coefficients(): { b: number[]; c: number[]; d: number[] } {
    return { b: [...this.b], c: [...this.c], d: [...this.d] };
  }

  evaluate(xq: number): number {
    const n = this.x.length;
    if (xq <= this.x[0]) return this.y[0];
    if (xq >= this.x[n - 1]) return this.y[n - 1];

    const i = findInsertionPoint(this.x, xq) - 1;
    const dx = xq - this.x[i];
    return this.y[i] + this.b[i] * dx + this.c[i] * dx * dx + this.d[i] * dx * dx * dx;
  }

  evaluateMany(xs: Samples): number[] {
    return xs.map(xq => this.evaluate(xq));
  }
}

export function buildAkimaSpline(x: Samples, y: Samples): AkimaSpline {
  return new AkimaSpline(x, y);
}

/** One-shot build and evaluate. */
export function akima(x: Samples, y: Samples, xq: number): number {
  return new AkimaSpline(x, y).evaluate(xq);
}
