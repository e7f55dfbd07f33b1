/**
 * Tests for random sources and samplers.
 */

import { describe, test, expect } from "vitest";
import {
  randomInUnitDisk,
  randomRange,
  randomUnitVector,
  seededRandom,
  type RandomSource,
} from "./random";
import { length, lengthSquared } from "./vec3";

/** Replays `values` in order, then repeats the last one. */
function scripted(values: number[]): RandomSource {
  let index = 0;
  return () => values[Math.min(index++, values.length - 1)] ?? 0;
}

// =============================================================================
// Tests: Generators
// =============================================================================

describe("seededRandom", () => {
  test("same seed gives the same sequence", () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    for (let i = 0; i < 20; i++) {
      expect(a()).toBe(b());
    }
  });

  test("different seeds diverge", () => {
    const a = seededRandom(1);
    const b = seededRandom(2);
    expect(a()).not.toBe(b());
  });

  test("stays in [0, 1)", () => {
    const random = seededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

// =============================================================================
// Tests: Samplers
// =============================================================================

describe("samplers", () => {
  test("randomRange maps [0, 1) onto [min, max)", () => {
    expect(randomRange(() => 0, -1, 1)).toBe(-1);
    expect(randomRange(() => 0.5, -1, 1)).toBe(0);
    expect(randomRange(() => 0.25, 2, 6)).toBe(3);
  });

  test("randomUnitVector rejects points outside the ball", () => {
    // first triple maps to [0.98, 0.98, 0.98], outside the ball
    const random = scripted([0.99, 0.99, 0.99, 0.5, 0.25, 0.5]);
    expect(randomUnitVector(random)).toEqual([0, -1, 0]);
  });

  test("randomUnitVector has unit length", () => {
    const random = seededRandom(3);
    for (let i = 0; i < 50; i++) {
      expect(length(randomUnitVector(random))).toBeCloseTo(1, 12);
    }
  });

  test("randomInUnitDisk lies in the z = 0 disk", () => {
    const random = seededRandom(5);
    for (let i = 0; i < 50; i++) {
      const p = randomInUnitDisk(random);
      expect(p[2]).toBe(0);
      expect(lengthSquared(p)).toBeLessThan(1);
    }
  });
});
