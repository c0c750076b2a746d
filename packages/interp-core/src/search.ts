import type { Samples } from "@core-types";

/**
 * Insertion point of `value` in an ascending sequence.
 *
 * Returns 0 at or below the first element and `n` at or above the last.
 * Inside the range it is the upper bound: every element before the index is
 * <= value, every element from the index on is > value. Duplicated knots are
 * skipped to the right, so `sorted[i - 1] < sorted[i]` always holds for the
 * returned bracket.
 */
export function findInsertionPoint(sorted: Samples, value: number): number {
  const n = sorted.length;
  if (n === 0) return 0;
  if (value <= sorted[0]) return 0;
  if (value >= sorted[n - 1]) return n;

  let lo = 0;
  let hi = n - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}
