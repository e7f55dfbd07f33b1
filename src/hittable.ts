/**
 * Ray-intersectable geometry: the sphere primitive and the flat list that
 * holds a whole scene.
 */

import { Interval } from "./interval";
import type { Material } from "./material";
import type { Ray } from "./ray";
import { div, dot, lengthSquared, negate, sub, type Point3, type Vec3 } from "./vec3";

export interface HitRecord {
  point: Point3;
  /** Unit length, facing against the incoming ray. */
  normal: Vec3;
  material: Material;
  t: number;
  frontFace: boolean;
}

/**
 * Builds a record whose normal points against `ray`.
 * `outwardNormal` must already be unit length.
 */
export function makeHitRecord(
  ray: Ray,
  t: number,
  point: Point3,
  outwardNormal: Vec3,
  material: Material
): HitRecord {
  const frontFace = dot(ray.direction, outwardNormal) < 0;
  return {
    point,
    normal: frontFace ? outwardNormal : negate(outwardNormal),
    material,
    t,
    frontFace,
  };
}

// =============================================================================
// Base
// =============================================================================

export abstract class Hittable {
  /** Nearest intersection with `t` strictly inside `rayT`, or null. */
  abstract hit(ray: Ray, rayT: Interval): HitRecord | null;
}

// =============================================================================
// Primitives
// =============================================================================

export class Sphere extends Hittable {
  constructor(
    public readonly center: Point3,
    public readonly radius: number,
    public readonly material: Material
  ) {
    super();
  }

  hit(ray: Ray, rayT: Interval): HitRecord | null {
    const oc = sub(this.center, ray.origin);
    const a = lengthSquared(ray.direction);
    const h = dot(ray.direction, oc);
    const c = lengthSquared(oc) - this.radius * this.radius;

    const discriminant = h * h - a * c;
    if (discriminant < 0) return null;

    const sqrtd = Math.sqrt(discriminant);

    // Nearest root inside the range wins
    let root = (h - sqrtd) / a;
    if (!rayT.surrounds(root)) {
      root = (h + sqrtd) / a;
      if (!rayT.surrounds(root)) return null;
    }

    const point = ray.at(root);
    const outwardNormal = div(sub(point, this.center), this.radius);
    return makeHitRecord(ray, root, point, outwardNormal, this.material);
  }
}

// =============================================================================
// Aggregate
// =============================================================================

export class HittableList extends Hittable {
  private objects: Hittable[];

  constructor(objects: Hittable[] = []) {
    super();
    this.objects = [...objects];
  }

  get size(): number {
    return this.objects.length;
  }

  get items(): readonly Hittable[] {
    return this.objects;
  }

  add(object: Hittable): this {
    this.objects.push(object);
    return this;
  }

  hit(ray: Ray, rayT: Interval): HitRecord | null {
    let closest: HitRecord | null = null;
    let closestSoFar = rayT.max;

    for (const object of this.objects) {
      const rec = object.hit(ray, new Interval(rayT.min, closestSoFar));
      if (rec) {
        closestSoFar = rec.t;
        closest = rec;
      }
    }

    return closest;
  }
}
