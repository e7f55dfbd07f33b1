/**
 * Importing this module registers every built-in scene.
 */

import "./random-spheres";
import "./materials";

export { randomSpheresScene } from "./random-spheres";
export { materialsScene } from "./materials";
