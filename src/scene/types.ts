/**
 * Shared types for the scene system.
 */

import type { CameraConfig } from "../camera";
import type { HittableList } from "../hittable";
import type { RandomSource } from "../random";

// =============================================================================
// Scene Interface
// =============================================================================

export interface SceneDef {
  name: string;
  description: string;
  /** Camera settings the scene was composed for; CLI flags override them. */
  camera: CameraConfig;
  /** Builds the world. Procedural scenes draw from `random`. */
  build(random: RandomSource): HittableList;
}
