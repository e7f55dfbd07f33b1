/**
 * Camera: turns pixel coordinates into world rays and integrates their color.
 */

import type { Hittable } from "./hittable";
import type { PpmWriter } from "./image";
import { Interval } from "./interval";
import { scatter } from "./material";
import { defaultRandom, randomInUnitDisk, type RandomSource } from "./random";
import { Ray } from "./ray";
import {
  add,
  cross,
  lerp,
  mul,
  normalize,
  scale,
  sub,
  type Color,
  type Point3,
  type Vec3,
} from "./vec3";

// =============================================================================
// Config
// =============================================================================

export interface CameraConfig {
  /** Image width over height. */
  aspectRatio?: number;
  imageWidth?: number;
  samplesPerPixel?: number;
  /** Maximum number of bounces per sample. */
  maxDepth?: number;
  /** Vertical field of view in degrees. */
  vfov?: number;
  lookFrom?: Point3;
  lookAt?: Point3;
  vup?: Vec3;
  /** Cone angle, in degrees, of rays through each pixel. 0 disables blur. */
  defocusAngle?: number;
  /** Distance from `lookFrom` to the plane of perfect focus. */
  focusDist?: number;
}

export interface RenderOptions {
  /** Called before each scanline with the number of rows left, including it. */
  onScanline?: (remaining: number) => void;
}

const BLACK: Color = [0, 0, 0];
const WHITE: Color = [1, 1, 1];
const SKY_BLUE: Color = [0.5, 0.7, 1.0];

// Ignore hits this close to the origin so a bounce does not re-hit its own surface
const HIT_RANGE = new Interval(0.001, Infinity);

function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Vertical white-to-blue gradient seen by rays that escape the scene. */
export function skyColor(direction: Vec3): Color {
  const a = 0.5 * (normalize(direction)[1] + 1.0);
  return lerp(WHITE, SKY_BLUE, a);
}

// =============================================================================
// Camera
// =============================================================================

export class Camera {
  readonly aspectRatio: number;
  readonly imageWidth: number;
  readonly imageHeight: number;
  readonly samplesPerPixel: number;
  readonly maxDepth: number;
  readonly vfov: number;
  readonly lookFrom: Point3;
  readonly lookAt: Point3;
  readonly vup: Vec3;
  readonly defocusAngle: number;
  readonly focusDist: number;

  private readonly center: Point3;
  private readonly pixel00: Point3;
  private readonly pixelDeltaU: Vec3;
  private readonly pixelDeltaV: Vec3;
  private readonly pixelSamplesScale: number;
  private readonly defocusDiskU: Vec3;
  private readonly defocusDiskV: Vec3;
  private readonly random: RandomSource;

  constructor(cfg: CameraConfig = {}, random: RandomSource = defaultRandom) {
    this.aspectRatio = cfg.aspectRatio ?? 1.0;
    this.imageWidth = cfg.imageWidth ?? 100;
    this.samplesPerPixel = cfg.samplesPerPixel ?? 10;
    this.maxDepth = cfg.maxDepth ?? 10;
    this.vfov = cfg.vfov ?? 90;
    this.lookFrom = cfg.lookFrom ?? [0, 0, 0];
    this.lookAt = cfg.lookAt ?? [0, 0, -1];
    this.vup = cfg.vup ?? [0, 1, 0];
    this.defocusAngle = cfg.defocusAngle ?? 0;
    this.focusDist = cfg.focusDist ?? 10;
    this.random = random;

    this.imageHeight = Math.max(1, Math.trunc(this.imageWidth / this.aspectRatio));
    this.pixelSamplesScale = 1.0 / this.samplesPerPixel;
    this.center = this.lookFrom;

    // Viewport size on the focus plane
    const h = Math.tan(degreesToRadians(this.vfov) / 2);
    const viewportHeight = 2 * h * this.focusDist;
    const viewportWidth = viewportHeight * (this.imageWidth / this.imageHeight);

    // Orthonormal camera frame; the camera looks down -w
    const w = normalize(sub(this.lookFrom, this.lookAt));
    const u = normalize(cross(this.vup, w));
    const v = cross(w, u);

    // Across the viewport horizontally, and down it vertically
    const viewportU = scale(u, viewportWidth);
    const viewportV = scale(v, -viewportHeight);

    this.pixelDeltaU = scale(viewportU, 1 / this.imageWidth);
    this.pixelDeltaV = scale(viewportV, 1 / this.imageHeight);

    const viewportUpperLeft = sub(
      sub(sub(this.center, scale(w, this.focusDist)), scale(viewportU, 0.5)),
      scale(viewportV, 0.5)
    );
    this.pixel00 = add(viewportUpperLeft, scale(add(this.pixelDeltaU, this.pixelDeltaV), 0.5));

    const defocusRadius = this.focusDist * Math.tan(degreesToRadians(this.defocusAngle / 2));
    this.defocusDiskU = scale(u, defocusRadius);
    this.defocusDiskV = scale(v, defocusRadius);
  }

  /**
   * Ray from the lens toward a random point inside pixel (i, j), where i is the
   * column and j the row counted from the top.
   */
  getRay(i: number, j: number): Ray {
    const offsetX = this.random() - 0.5;
    const offsetY = this.random() - 0.5;
    const pixelSample = add(
      add(this.pixel00, scale(this.pixelDeltaU, i + offsetX)),
      scale(this.pixelDeltaV, j + offsetY)
    );

    const origin = this.defocusAngle <= 0 ? this.center : this.defocusDiskSample();
    return new Ray(origin, sub(pixelSample, origin));
  }

  /**
   * Color carried back along `ray` after at most `depth` bounces.
   * Iterative: the running attenuation product replaces the call stack.
   */
  rayColor(ray: Ray, depth: number, world: Hittable): Color {
    let current = ray;
    let throughput: Color = WHITE;

    for (let remaining = depth; remaining > 0; remaining--) {
      const rec = world.hit(current, HIT_RANGE);
      if (!rec) {
        return mul(throughput, skyColor(current.direction));
      }

      const scattered = scatter(rec.material, current, rec, this.random);
      if (!scattered) {
        return BLACK;
      }

      throughput = mul(throughput, scattered.attenuation);
      current = scattered.ray;
    }

    // Bounce budget exhausted
    return BLACK;
  }

  /** Average of `samplesPerPixel` jittered samples through pixel (i, j). */
  samplePixel(i: number, j: number, world: Hittable): Color {
    let sum: Color = [0, 0, 0];
    for (let sample = 0; sample < this.samplesPerPixel; sample++) {
      sum = add(sum, this.rayColor(this.getRay(i, j), this.maxDepth, world));
    }
    return scale(sum, this.pixelSamplesScale);
  }

  render(world: Hittable, writer: PpmWriter, options: RenderOptions = {}): void {
    writer.header(this.imageWidth, this.imageHeight);

    for (let j = 0; j < this.imageHeight; j++) {
      options.onScanline?.(this.imageHeight - j);
      for (let i = 0; i < this.imageWidth; i++) {
        writer.pixel(this.samplePixel(i, j, world));
      }
      writer.flush();
    }
  }

  private defocusDiskSample(): Point3 {
    const p = randomInUnitDisk(this.random);
    return add(add(this.center, scale(this.defocusDiskU, p[0])), scale(this.defocusDiskV, p[1]));
  }
}
