/**
 * Surface materials and their scattering rules.
 *
 * The set is closed, so a material is plain frozen data tagged by `kind` and
 * `scatter` switches over it. Many spheres may share one material object.
 */

import type { HitRecord } from "./hittable";
import { randomUnitVector, type RandomSource } from "./random";
import { Ray } from "./ray";
import {
  add,
  dot,
  nearZero,
  negate,
  normalize,
  reflect,
  refract,
  scale,
  type Color,
} from "./vec3";

export const MaterialKind = {
  LAMBERTIAN: 0,
  METAL: 1,
  DIELECTRIC: 2,
} as const;

export interface Lambertian {
  readonly kind: typeof MaterialKind.LAMBERTIAN;
  readonly albedo: Color;
}

export interface Metal {
  readonly kind: typeof MaterialKind.METAL;
  readonly albedo: Color;
  /** Perturbation radius; anything above 1 acts as 1. */
  readonly fuzz: number;
}

export interface Dielectric {
  readonly kind: typeof MaterialKind.DIELECTRIC;
  /**
   * Index of the material over the index of the enclosing medium. An air
   * bubble inside glass uses `1 / 1.5`.
   */
  readonly refractionIndex: number;
}

export type Material = Lambertian | Metal | Dielectric;

export interface ScatterResult {
  ray: Ray;
  attenuation: Color;
}

// =============================================================================
// Convenience Constructors
// =============================================================================

export const materials = {
  lambertian: (albedo: Color): Lambertian =>
    Object.freeze({ kind: MaterialKind.LAMBERTIAN, albedo }),

  metal: (albedo: Color, fuzz: number = 0): Metal =>
    Object.freeze({ kind: MaterialKind.METAL, albedo, fuzz }),

  dielectric: (refractionIndex: number): Dielectric =>
    Object.freeze({ kind: MaterialKind.DIELECTRIC, refractionIndex }),
};

// =============================================================================
// Scattering
// =============================================================================

const WHITE: Color = [1, 1, 1];

/** Schlick's approximation of Fresnel reflectance. */
export function reflectance(cosine: number, refractionIndex: number): number {
  let r0 = (1 - refractionIndex) / (1 + refractionIndex);
  r0 = r0 * r0;
  return r0 + (1 - r0) * Math.pow(1 - cosine, 5);
}

/** Returns the continuing ray and its attenuation, or null when absorbed. */
export function scatter(
  material: Material,
  rayIn: Ray,
  rec: HitRecord,
  random: RandomSource
): ScatterResult | null {
  switch (material.kind) {
    case MaterialKind.LAMBERTIAN:
      return scatterLambertian(material, rec, random);
    case MaterialKind.METAL:
      return scatterMetal(material, rayIn, rec, random);
    case MaterialKind.DIELECTRIC:
      return scatterDielectric(material, rayIn, rec, random);
  }
}

function scatterLambertian(
  material: Lambertian,
  rec: HitRecord,
  random: RandomSource
): ScatterResult {
  let direction = add(rec.normal, randomUnitVector(random));
  if (nearZero(direction)) {
    direction = rec.normal;
  }
  return { ray: new Ray(rec.point, direction), attenuation: material.albedo };
}

function scatterMetal(
  material: Metal,
  rayIn: Ray,
  rec: HitRecord,
  random: RandomSource
): ScatterResult {
  // fuzz offsets the unit reflection
  const reflected = normalize(reflect(rayIn.direction, rec.normal));
  const fuzz = Math.min(material.fuzz, 1.0);
  const direction = add(reflected, scale(randomUnitVector(random), fuzz));
  return { ray: new Ray(rec.point, direction), attenuation: material.albedo };
}

function scatterDielectric(
  material: Dielectric,
  rayIn: Ray,
  rec: HitRecord,
  random: RandomSource
): ScatterResult {
  const ri = rec.frontFace ? 1.0 / material.refractionIndex : material.refractionIndex;

  const unitDirection = normalize(rayIn.direction);
  const cosTheta = Math.min(dot(negate(unitDirection), rec.normal), 1.0);
  const sinTheta = Math.sqrt(1.0 - cosTheta * cosTheta);

  const cannotRefract = ri * sinTheta > 1.0;
  const direction =
    cannotRefract || reflectance(cosTheta, ri) > random()
      ? reflect(unitDirection, rec.normal)
      : refract(unitDirection, rec.normal, ri);

  return { ray: new Ray(rec.point, direction), attenuation: WHITE };
}
