/**
 * anchor-scroll - Height Estimation Tests
 */

import { describe, it, expect } from "vitest";
import {
  computeMeanHeight,
  isReasonableMeanHeight,
  isUsableItemHeight,
  itemsToCover,
  sanitizeItemHeight,
} from "../../src/core/heights";

describe("sanitizeItemHeight", () => {
  it("should keep positive finite heights", () => {
    expect(sanitizeItemHeight(24.5)).toBe(24.5);
  });

  it("should turn negative and non-finite heights into zero", () => {
    expect(sanitizeItemHeight(-3)).toBe(0);
    expect(sanitizeItemHeight(Number.NaN)).toBe(0);
    expect(sanitizeItemHeight(Number.POSITIVE_INFINITY)).toBe(0);
  });

  it("should accept zero as a usable height", () => {
    expect(isUsableItemHeight(0)).toBe(true);
    expect(isUsableItemHeight(-1)).toBe(false);
  });
});

describe("mean height", () => {
  it("should average the measured heights", () => {
    expect(computeMeanHeight(90, 9, 60)).toBe(10);
  });

  it("should keep the previous mean when nothing was measured", () => {
    expect(computeMeanHeight(0, 0, 42)).toBe(42);
  });

  it("should reject means below the minimum", () => {
    expect(isReasonableMeanHeight(0.01)).toBe(true);
    expect(isReasonableMeanHeight(0.001)).toBe(false);
    expect(isReasonableMeanHeight(0)).toBe(false);
    expect(isReasonableMeanHeight(Number.NaN)).toBe(false);
  });
});

describe("itemsToCover", () => {
  it("should round up", () => {
    expect(itemsToCover(310, 60)).toBe(6n);
    expect(itemsToCover(150, 60)).toBe(3n);
    expect(itemsToCover(120, 10)).toBe(12n);
  });

  it("should count nothing for empty or degenerate distances", () => {
    expect(itemsToCover(0, 10)).toBe(0n);
    expect(itemsToCover(Number.POSITIVE_INFINITY, 10)).toBe(0n);
  });
});
