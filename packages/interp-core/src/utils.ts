import type { Samples } from "@core-types";
import {
  EmptyInputError,
  InvalidArgumentError,
  InvalidDomainError,
  LengthMismatchError,
} from "./errors.js";

export function assertSameLength(x: Samples, y: Samples, tag: string): void {
  if (x.length !== y.length) {
    throw new LengthMismatchError(`${tag}: x/y length mismatch ${x.length} vs ${y.length}`);
  }
}

/** Paired samples: equal length, at least one point. */
export function assertSamples(x: Samples, y: Samples, tag: string): void {
  assertSameLength(x, y, tag);
  if (x.length === 0) {
    throw new EmptyInputError(`${tag}: sample data is empty`);
  }
}

export function assertPositive(x: number, tag: string): void {
  if (!(x > 0)) {
    throw new InvalidDomainError(`Non-positive value at ${tag}: ${x}`);
  }
}

export function assertDegree(degree: number, tag: string): void {
  if (!Number.isInteger(degree) || degree < 0) {
    throw new InvalidArgumentError(`${tag}: degree must be a non-negative integer, got ${degree}`);
  }
}
