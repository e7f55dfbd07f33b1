/**
 * Materials - one sphere of each kind side by side. Small and quick, for
 * previews.
 */

import { HittableList, Sphere } from "../hittable";
import { materials } from "../material";
import { registerScene, type SceneDef } from "../scene";

const ground = materials.lambertian([0.8, 0.8, 0.0]);
const center = materials.lambertian([0.1, 0.2, 0.5]);
const glass = materials.dielectric(1.5);
// air inside glass
const bubble = materials.dielectric(1.0 / 1.5);
const gold = materials.metal([0.8, 0.6, 0.2], 1.0);

export const materialsScene: SceneDef = {
  name: "materials",
  description: "Diffuse, hollow glass and fuzzy metal spheres on a yellow ground",
  camera: {
    aspectRatio: 16 / 9,
    imageWidth: 400,
    samplesPerPixel: 50,
    maxDepth: 10,
    vfov: 20,
    lookFrom: [-2, 2, 1],
    lookAt: [0, 0, -1],
    vup: [0, 1, 0],
    defocusAngle: 10.0,
    focusDist: 3.4,
  },
  build: () =>
    new HittableList([
      new Sphere([0.0, -100.5, -1.0], 100.0, ground),
      new Sphere([0.0, 0.0, -1.2], 0.5, center),
      new Sphere([-1.0, 0.0, -1.0], 0.5, glass),
      new Sphere([-1.0, 0.0, -1.0], 0.4, bubble),
      new Sphere([1.0, 0.0, -1.0], 0.5, gold),
    ]),
};

registerScene(materialsScene);
