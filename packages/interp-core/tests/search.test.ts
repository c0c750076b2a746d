import { describe, it, expect } from "vitest";
import { findInsertionPoint } from "../src/search.js";

describe("findInsertionPoint", () => {
  it("returns 0 for an empty sequence", () => {
    expect(findInsertionPoint([], 3)).toBe(0);
  });

  it("clamps to 0 and n at the ends", () => {
    const s = [1, 2, 3, 4];
    expect(findInsertionPoint(s, -5)).toBe(0);
    expect(findInsertionPoint(s, 1)).toBe(0);
    expect(findInsertionPoint(s, 4)).toBe(4);
    expect(findInsertionPoint(s, 10)).toBe(4);
  });

  it("returns the first index holding a larger value", () => {
    const s = [1, 2, 3, 4];
    expect(findInsertionPoint(s, 2.5)).toBe(2);
    expect(findInsertionPoint(s, 1.0001)).toBe(1);
    expect(findInsertionPoint(s, 3.9999)).toBe(3);
  });

  it("places a query on an interior knot after that knot", () => {
    expect(findInsertionPoint([1, 2, 3, 4], 2)).toBe(2);
  });

  it("skips every copy of a duplicated knot", () => {
    expect(findInsertionPoint([0, 1, 1, 1, 2], 1)).toBe(4);
  });
});
