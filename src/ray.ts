import { add, scale, type Point3, type Vec3 } from "./vec3";

/**
 * Half-line `origin + t * direction`. The direction keeps whatever length it
 * was built with.
 */
export class Ray {
  constructor(
    public readonly origin: Point3,
    public readonly direction: Vec3
  ) {}

  at(t: number): Point3 {
    return add(this.origin, scale(this.direction, t));
  }
}
