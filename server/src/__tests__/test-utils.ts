import { expect } from "vitest";

/** Assert that `actual` is within `±tolerance` of `expected`. */
export function expectCloseTo(actual: number, expected: number, tolerance: number) {
  expect(actual).toBeGreaterThanOrEqual(expected - tolerance);
  expect(actual).toBeLessThanOrEqual(expected + tolerance);
}

/** Assert that every value is strictly above (or below) the one before it. */
export function expectMonotonic(values: readonly number[], direction: "increasing" | "decreasing") {
  values.forEach((value, i) => {
    if (i === 0) return;
    const previous = values[i - 1];
    if (direction === "increasing") expect(value).toBeGreaterThan(previous ?? -Infinity);
    else expect(value).toBeLessThan(previous ?? Infinity);
  });
}
