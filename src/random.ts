/**
 * Random sampling helpers. Every sampler takes its source explicitly so a
 * render can be made reproducible by handing in a seeded generator.
 */

import { lengthSquared, div, type Vec3 } from "./vec3";

/** Returns a uniform value in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

// =============================================================================
// Generators
// =============================================================================

/** Linear congruential generator, good enough for sampling jitter. */
export function seededRandom(seed: number): RandomSource {
  let state = seed & 0x7fffffff;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}

// =============================================================================
// Samplers
// =============================================================================

export function randomRange(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}

export function randomVec3(random: RandomSource): Vec3 {
  return [random(), random(), random()];
}

export function randomVec3Range(random: RandomSource, min: number, max: number): Vec3 {
  return [
    randomRange(random, min, max),
    randomRange(random, min, max),
    randomRange(random, min, max),
  ];
}

/** Uniform direction on the unit sphere, by rejection from the cube. */
export function randomUnitVector(random: RandomSource): Vec3 {
  for (;;) {
    const p = randomVec3Range(random, -1, 1);
    const lensq = lengthSquared(p);
    // Tiny vectors would blow up when normalized
    if (1e-160 < lensq && lensq < 1) {
      return div(p, Math.sqrt(lensq));
    }
  }
}

/** Point in the unit disk on the z = 0 plane. */
export function randomInUnitDisk(random: RandomSource): Vec3 {
  for (;;) {
    const p: Vec3 = [randomRange(random, -1, 1), randomRange(random, -1, 1), 0];
    if (lengthSquared(p) < 1) {
      return p;
    }
  }
}
