/**
 * Random spheres - a field of small spheres in mixed materials around three
 * large feature spheres, seen from low over the ground.
 */

import { HittableList, Sphere } from "../hittable";
import { materials, type Material } from "../material";
import { randomRange, randomVec3, type RandomSource } from "../random";
import { registerScene, type SceneDef } from "../scene";
import { length, mul, sub, type Point3, type Vec3 } from "../vec3";

// =============================================================================
// Config
// =============================================================================

const clearCenter: Point3 = [4, 0.2, 0];

const gridParams = {
  // small spheres are placed for a, b in [-extent, extent)
  extent: 11,
  jitter: 0.9,
  radius: 0.2,
  // keep the grid clear of the metal feature sphere
  clearCenter,
  clearRadius: 0.9,
};

const materialOdds = {
  diffuse: 0.8,
  metal: 0.95,
};

// =============================================================================
// Build
// =============================================================================

function smallSphereMaterial(random: RandomSource): Material {
  const choice = random();
  if (choice < materialOdds.diffuse) {
    return materials.lambertian(mul(randomVec3(random), randomVec3(random)));
  }
  if (choice < materialOdds.metal) {
    const albedo: Vec3 = [0.5, 1.0, random()];
    return materials.metal(albedo, randomRange(random, 0, 0.5));
  }
  return materials.dielectric(1.5);
}

function build(random: RandomSource): HittableList {
  const world = new HittableList();

  world.add(new Sphere([0, -1000, -1], 1000, materials.lambertian([0.5, 0.5, 0.5])));

  const { extent, jitter, radius, clearCenter, clearRadius } = gridParams;
  for (let a = -extent; a < extent; a++) {
    for (let b = -extent; b < extent; b++) {
      const center: Point3 = [a + jitter * random(), radius, b + jitter * random()];
      if (length(sub(center, clearCenter)) > clearRadius) {
        world.add(new Sphere(center, radius, smallSphereMaterial(random)));
      }
    }
  }

  world.add(new Sphere([0, 1, 0], 1.0, materials.dielectric(1.5)));
  world.add(new Sphere([-4, 1, 0], 1.0, materials.lambertian([0.4, 0.2, 0.1])));
  world.add(new Sphere([4, 1, 0], 1.0, materials.metal([0.7, 0.6, 0.5], 0.0)));

  return world;
}

export const randomSpheresScene: SceneDef = {
  name: "random-spheres",
  description: "Ground plane covered in small random spheres with three large feature spheres",
  camera: {
    aspectRatio: 16 / 9,
    imageWidth: 600,
    samplesPerPixel: 100,
    maxDepth: 25,
    vfov: 20,
    lookFrom: [13, 2, 3],
    lookAt: [0, 0, 0],
    vup: [0, 1, 0],
    defocusAngle: 0.6,
    focusDist: 10.0,
  },
  build,
};

registerScene(randomSpheresScene);
