import { describe, expect, it } from "vitest";
import { clamp, isInRange } from "./MathUtils.js";
import { isGridPosition, isInteger, isNonNegativeInteger, isPositiveInteger } from "./typeGuards.js";

describe("isInRange", () => {
  it("is inclusive on both ends", () => {
    expect(isInRange(0, 0, 4)).toBe(true);
    expect(isInRange(4, 0, 4)).toBe(true);
    expect(isInRange(-1, 0, 4)).toBe(false);
    expect(isInRange(5, 0, 4)).toBe(false);
  });

  it("is empty when max is below min", () => {
    expect(isInRange(0, 0, -1)).toBe(false);
  });
});

describe("clamp", () => {
  it("limits values to the range", () => {
    expect(clamp(-3, 0, 10)).toBe(0);
    expect(clamp(15, 0, 10)).toBe(10);
    expect(clamp(7, 0, 10)).toBe(7);
  });
});

describe("numeric guards", () => {
  it("accepts only integers", () => {
    expect(isInteger(3)).toBe(true);
    expect(isInteger(1.5)).toBe(false);
    expect(isInteger(Number.NaN)).toBe(false);
    expect(isInteger("3")).toBe(false);
  });

  it("separates positive and non-negative integers", () => {
    expect(isPositiveInteger(0)).toBe(false);
    expect(isPositiveInteger(2)).toBe(true);
    expect(isNonNegativeInteger(0)).toBe(true);
    expect(isNonNegativeInteger(-1)).toBe(false);
  });
});

describe("isGridPosition", () => {
  it("requires integer x and y", () => {
    expect(isGridPosition({ x: 1, y: 2 })).toBe(true);
    expect(isGridPosition({ x: 1.5, y: 2 })).toBe(false);
    expect(isGridPosition({ x: 1 })).toBe(false);
    expect(isGridPosition(null)).toBe(false);
    expect(isGridPosition([1, 2])).toBe(false);
  });
});
