import { describe, it, expect } from "vitest";
import { batchLinear, bilinear, linear, linearBetween, logLinear, nearest } from "../src/piecewise.js";
import {
  DimensionMismatchError,
  EmptyInputError,
  InvalidDomainError,
  LengthMismatchError,
  isNumericError,
} from "../src/errors.js";

describe("linear", () => {
  const x = [0, 1, 2];
  const y = [0, 10, 40];

  it("is exact at every knot", () => {
    x.forEach((xi, i) => expect(linear(x, y, xi)).toBe(y[i]));
  });

  it("interpolates inside a segment", () => {
    expect(linear(x, y, 0.5)).toBe(5);
    expect(linear(x, y, 1.5)).toBe(25);
    expect(linearBetween(0, 1, 4, 3, 1)).toBe(1.5);
  });

  it("clamps instead of extrapolating", () => {
    expect(linear(x, y, -3)).toBe(0);
    expect(linear(x, y, 7)).toBe(40);
  });

  it("returns the only sample for single-point data", () => {
    expect(linear([2], [9], -100)).toBe(9);
    expect(linear([2], [9], 100)).toBe(9);
  });

  it("brackets past duplicated knots", () => {
    const xd = [0, 1, 1, 2];
    const yd = [0, 5, 7, 9];
    expect(linear(xd, yd, 1)).toBe(7);
    expect(linear(xd, yd, 0.5)).toBe(2.5);
    expect(linear(xd, yd, 1.5)).toBe(8);
  });

  it("rejects mismatched and empty data", () => {
    expect(() => linear([0, 1], [1], 0.5)).toThrow(LengthMismatchError);
    expect(() => linear([], [], 0.5)).toThrow(EmptyInputError);
  });
});

describe("batchLinear", () => {
  it("maps every target independently", () => {
    expect(batchLinear([0, 1, 2], [0, 10, 40], [-1, 0.5, 1.5, 3])).toEqual([0, 5, 25, 40]);
  });

  it("validates the table even with no targets", () => {
    expect(batchLinear([0, 1], [0, 1], [])).toEqual([]);
    expect(() => batchLinear([0, 1], [0], [])).toThrow(LengthMismatchError);
  });
});

describe("logLinear", () => {
  const freq = [10, 100, 1000];
  const db = [0, -20, -40];

  it("interpolates linearly in log10 frequency", () => {
    expect(logLinear(freq, db, 100)).toBe(-20);
    expect(logLinear(freq, db, Math.pow(10, 2.5))).toBeCloseTo(-30, 9);
  });

  it("clamps outside the table", () => {
    expect(logLinear(freq, db, 5)).toBe(0);
    expect(logLinear(freq, db, 1e4)).toBe(-40);
  });

  it("requires positive frequencies", () => {
    expect(() => logLinear(freq, db, 0)).toThrow(InvalidDomainError);
    expect(() => logLinear(freq, db, -10)).toThrow(InvalidDomainError);
    expect(() => logLinear([0, 10], [1, 2], 5)).toThrow(InvalidDomainError);
  });
});

describe("nearest", () => {
  it("snaps to the closer attenuator step", () => {
    const steps = Array.from({ length: 13 }, (_, i) => i * 0.5);
    expect(nearest(steps, steps, 4.3)).toBe(4.5);
    expect(nearest(steps, steps, 4.2)).toBe(4.0);
  });

  it("favours the left neighbour on a tie", () => {
    expect(nearest([0, 1], [5, 7], 0.5)).toBe(5);
  });

  it("clamps outside the table", () => {
    expect(nearest([0, 1, 2], [3, 4, 5], -1)).toBe(3);
    expect(nearest([0, 1, 2], [3, 4, 5], 9)).toBe(5);
  });

  it("shares the linear validation", () => {
    expect(() => nearest([], [], 0)).toThrow(EmptyInputError);
    expect(() => nearest([0, 1], [0, 1, 2], 0)).toThrow(LengthMismatchError);
  });
});

describe("bilinear", () => {
  // z = 20x + y
  const xGrid = [0, 1, 2];
  const yGrid = [0, 10];
  const table = [
    [0, 10],
    [20, 30],
    [40, 50],
  ];

  it("blends the four corners of a cell", () => {
    expect(bilinear(xGrid, yGrid, table, 0.5, 5)).toBe(15);
    expect(bilinear(xGrid, yGrid, table, 1.5, 2.5)).toBe(32.5);
  });

  it("reproduces grid values", () => {
    expect(bilinear(xGrid, yGrid, table, 1, 0)).toBe(20);
    expect(bilinear(xGrid, yGrid, table, 1, 10)).toBe(30);
  });

  it("falls back to 1D along the nearest edge off the grid", () => {
    expect(bilinear(xGrid, yGrid, table, -1, 5)).toBe(5);
    expect(bilinear(xGrid, yGrid, table, 3, 5)).toBe(45);
    expect(bilinear(xGrid, yGrid, table, 0.5, -3)).toBe(10);
    expect(bilinear(xGrid, yGrid, table, 1.5, 20)).toBe(40);
  });

  it("clamps to the corner when off both axes", () => {
    expect(bilinear(xGrid, yGrid, table, -1, -1)).toBe(0);
    expect(bilinear(xGrid, yGrid, table, 5, 50)).toBe(50);
  });

  it("rejects tables that do not match the grids", () => {
    expect(() => bilinear(xGrid, yGrid, table.slice(0, 2), 0.5, 5)).toThrow(DimensionMismatchError);
    expect(() => bilinear(xGrid, yGrid, [[0, 10], [20], [40, 50]], 0.5, 5)).toThrow(DimensionMismatchError);
    expect(() => bilinear([], yGrid, [], 0.5, 5)).toThrow(EmptyInputError);
  });

  it("reports the error code", () => {
    try {
      bilinear(xGrid, [0], table, 0.5, 5);
      expect.unreachable();
    } catch (err) {
      expect(isNumericError(err, "DimensionMismatch")).toBe(true);
    }
  });
});
