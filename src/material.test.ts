/**
 * Tests for material scattering.
 */

import { describe, test, expect } from "vitest";
import type { HitRecord } from "./hittable";
import { MaterialKind, materials, reflectance, scatter, type Material } from "./material";
import type { RandomSource } from "./random";
import { Ray } from "./ray";
import type { Vec3 } from "./vec3";

// =============================================================================
// Test Harness
// =============================================================================

function expectVec3Close(actual: Vec3 | undefined, expected: Vec3, digits = 12) {
  expect(actual).toBeDefined();
  expect(actual?.[0]).toBeCloseTo(expected[0], digits);
  expect(actual?.[1]).toBeCloseTo(expected[1], digits);
  expect(actual?.[2]).toBeCloseTo(expected[2], digits);
}

function record(material: Material, normal: Vec3, frontFace = true): HitRecord {
  return { point: [0, 0, 0], normal, material, t: 1, frontFace };
}

const constant = (value: number): RandomSource => () => value;

/** Replays `values` in order, then repeats the last one. */
function scripted(values: number[]): RandomSource {
  let index = 0;
  return () => values[Math.min(index++, values.length - 1)] ?? 0;
}

const noSampling: RandomSource = () => {
  throw new Error("random source should not be consulted");
};

// With a constant 0.75 source, randomUnitVector yields this
const DIAGONAL = 1 / Math.sqrt(3);

// =============================================================================
// Tests: Constructors
// =============================================================================

describe("materials", () => {
  test("are frozen and tagged", () => {
    const glass = materials.dielectric(1.5);
    expect(glass.kind).toBe(MaterialKind.DIELECTRIC);
    expect(Object.isFrozen(glass)).toBe(true);
  });

  test("metal fuzz defaults to 0", () => {
    expect(materials.metal([1, 1, 1]).fuzz).toBe(0);
  });
});

// =============================================================================
// Tests: Lambertian
// =============================================================================

describe("lambertian", () => {
  const albedo: Vec3 = [0.2, 0.4, 0.6];
  const matte = materials.lambertian(albedo);

  test("scatters around the normal and attenuates by the albedo", () => {
    const rec = record(matte, [0, 1, 0]);
    const result = scatter(matte, new Ray([0, 5, 0], [0, -1, 0]), rec, constant(0.75));
    expectVec3Close(result?.ray.direction, [DIAGONAL, 1 + DIAGONAL, DIAGONAL]);
    expect(result?.ray.origin).toBe(rec.point);
    expect(result?.attenuation).toBe(albedo);
  });

  test("falls back to the normal when the sample cancels it", () => {
    const rec = record(matte, [0, 1, 0]);
    // unit vector [0, -1, 0] exactly opposes the normal
    const result = scatter(matte, new Ray([0, 5, 0], [0, -1, 0]), rec, scripted([0.5, 0.25, 0.5]));
    expect(result?.ray.direction).toEqual([0, 1, 0]);
  });
});

// =============================================================================
// Tests: Metal
// =============================================================================

describe("metal", () => {
  const incoming = new Ray([-1, 1, 0], [1, -1, 0]);

  test("polished metal reflects exactly", () => {
    const mirror = materials.metal([0.7, 0.6, 0.5], 0);
    const result = scatter(mirror, incoming, record(mirror, [0, 1, 0]), constant(0.75));
    expectVec3Close(result?.ray.direction, [Math.SQRT1_2, Math.SQRT1_2, 0]);
    expect(result?.attenuation).toEqual([0.7, 0.6, 0.5]);
  });

  test("fuzz is added after normalizing the reflection", () => {
    const brushed = materials.metal([1, 1, 1], 0.5);
    const result = scatter(brushed, incoming, record(brushed, [0, 1, 0]), constant(0.75));
    const offset = 0.5 * DIAGONAL;
    expectVec3Close(result?.ray.direction, [
      Math.SQRT1_2 + offset,
      Math.SQRT1_2 + offset,
      offset,
    ]);
  });

  test("fuzz may push a grazing reflection below the surface", () => {
    const rough = materials.metal([1, 1, 1], 1);
    const grazing = new Ray([-1, 0.01, 0], [1, -0.01, 0]);
    // [0.5, 0.25, 0.5] samples the unit vector [0, -1, 0]
    const result = scatter(rough, grazing, record(rough, [0, 1, 0]), scripted([0.5, 0.25, 0.5]));

    expect(result).not.toBeNull();
    const reflectedY = 0.01 / Math.sqrt(1.0001);
    expectVec3Close(result?.ray.direction, [1 / Math.sqrt(1.0001), reflectedY - 1, 0]);
    expect(result?.ray.direction[1]).toBeLessThan(0);
  });

  test("fuzz above 1 behaves like 1", () => {
    const rough = materials.metal([1, 1, 1], 5);
    const capped = materials.metal([1, 1, 1], 1);
    const a = scatter(rough, incoming, record(rough, [0, 1, 0]), constant(0.75));
    const b = scatter(capped, incoming, record(capped, [0, 1, 0]), constant(0.75));
    expect(a?.ray.direction).toEqual(b?.ray.direction);
  });
});

// =============================================================================
// Tests: Dielectric
// =============================================================================

describe("reflectance", () => {
  test("head-on reflectance is the base term r0", () => {
    for (const index of [1.5, 1 / 1.5, 2.4]) {
      const r0 = (1 - index) / (1 + index);
      expect(reflectance(1.0, index)).toBe(r0 * r0);
    }
  });

  test("grazing reflectance approaches 1", () => {
    expect(reflectance(0, 1.5)).toBeCloseTo(1, 12);
  });
});

describe("dielectric", () => {
  const glass = materials.dielectric(1.5);
  const headOn = new Ray([0, 0, 5], [0, 0, -1]);

  test("refracts straight through at normal incidence", () => {
    const result = scatter(glass, headOn, record(glass, [0, 0, 1]), constant(0.5));
    expectVec3Close(result?.ray.direction, [0, 0, -1]);
    expect(result?.attenuation).toEqual([1, 1, 1]);
  });

  test("reflects when the draw falls under the reflectance", () => {
    // reflectance at normal incidence is 0.04
    const result = scatter(glass, headOn, record(glass, [0, 0, 1]), constant(0.01));
    expectVec3Close(result?.ray.direction, [0, 0, 1]);
  });

  test("total internal reflection when leaving at a shallow angle", () => {
    // exiting through a surface whose outward normal is +y; stored normal faces the ray
    const leaving = new Ray([0, 0, 0], [0.8, 0.6, 0]);
    const result = scatter(glass, leaving, record(glass, [0, -1, 0], false), noSampling);
    expectVec3Close(result?.ray.direction, [0.8, -0.6, 0]);
    expect(result?.attenuation).toEqual([1, 1, 1]);
  });

  test("bends toward the normal on entry", () => {
    const entering = new Ray([-1, 1, 0], [1, -1, 0]);
    const result = scatter(glass, entering, record(glass, [0, 1, 0]), constant(0.99));
    expect(result?.ray.direction[0]).toBeCloseTo(Math.SQRT1_2 / 1.5, 12);
    expect(result?.ray.direction[1]).toBeLessThan(0);
  });
});
