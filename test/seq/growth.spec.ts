// test/seq/growth.spec.ts
// Capacity growth policy

import { describe, it, expect } from "vitest";
import { GROWTH_THRESHOLD, bitCeil, nextCapacity } from "../../src/core/seq";

describe("bitCeil", () => {
  it("rounds up to powers of two", () => {
    expect(bitCeil(0)).toBe(1);
    expect(bitCeil(1)).toBe(1);
    expect(bitCeil(5)).toBe(8);
    expect(bitCeil(1024)).toBe(1024);
    expect(bitCeil(1025)).toBe(2048);
  });
});

describe("nextCapacity", () => {
  it("keeps capacity that already fits", () => {
    expect(nextCapacity(8, 5)).toBe(8);
    expect(nextCapacity(8, 8)).toBe(8);
  });

  it("rounds to a power of two below the threshold", () => {
    expect(nextCapacity(0, 1)).toBe(1);
    expect(nextCapacity(2, 6)).toBe(8);
    expect(nextCapacity(8, 11)).toBe(16);
    expect(nextCapacity(16, 17)).toBe(32);
    expect(nextCapacity(600, 601)).toBe(1024);
  });

  it("grows by 1.5x at and above the threshold", () => {
    expect(GROWTH_THRESHOLD).toBe(1024);
    expect(nextCapacity(1024, 1025)).toBe(1536);
    expect(nextCapacity(1000, 1001)).toBe(1500);
  });

  it("clamps up to the requested size", () => {
    expect(nextCapacity(1500, 5000)).toBe(5000);
    expect(nextCapacity(4, 700)).toBe(1024);
  });

  it("always fits the request", () => {
    for (let cap = 0; cap < 3000; cap += 37) {
      for (const extra of [1, 2, 50, 900]) {
        const next = nextCapacity(cap, cap + extra);
        expect(next).toBeGreaterThanOrEqual(cap + extra);
        if (next < GROWTH_THRESHOLD) {
          expect(next & (next - 1)).toBe(0);
        }
      }
    }
  });
});
