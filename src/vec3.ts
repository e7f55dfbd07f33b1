/**
 * Tuple vector math shared by geometry, materials and the camera.
 *
 * Points, directions and colors all use the same `[x, y, z]` representation.
 * Every helper returns a fresh tuple and leaves its inputs untouched.
 */

export type Vec3 = [number, number, number];
export type Point3 = Vec3;
export type Color = Vec3;

// =============================================================================
// Arithmetic
// =============================================================================

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/** Component-wise product, used for color attenuation. */
export function mul(a: Vec3, b: Vec3): Vec3 {
  return [a[0] * b[0], a[1] * b[1], a[2] * b[2]];
}

export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function div(v: Vec3, s: number): Vec3 {
  return [v[0] / s, v[1] / s, v[2] / s];
}

export function negate(v: Vec3): Vec3 {
  return [-v[0], -v[1], -v[2]];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function lengthSquared(v: Vec3): number {
  return v[0] * v[0] + v[1] * v[1] + v[2] * v[2];
}

export function length(v: Vec3): number {
  return Math.sqrt(lengthSquared(v));
}

export function normalize(v: Vec3): Vec3 {
  return div(v, length(v));
}

/** Linear blend: `t = 0` gives `a`, `t = 1` gives `b`. */
export function lerp(a: Vec3, b: Vec3, t: number): Vec3 {
  return add(scale(a, 1 - t), scale(b, t));
}

// =============================================================================
// Optics
// =============================================================================

const NEAR_ZERO = 1e-8;

export function nearZero(v: Vec3): boolean {
  return (
    Math.abs(v[0]) < NEAR_ZERO &&
    Math.abs(v[1]) < NEAR_ZERO &&
    Math.abs(v[2]) < NEAR_ZERO
  );
}

/** Mirror `v` about the unit normal `n`. */
export function reflect(v: Vec3, n: Vec3): Vec3 {
  return sub(v, scale(n, 2 * dot(v, n)));
}

/**
 * Bend the unit vector `uv` through a surface with unit normal `n`.
 * `etaRatio` is the incident index over the transmitted index.
 */
export function refract(uv: Vec3, n: Vec3, etaRatio: number): Vec3 {
  const cosTheta = Math.min(dot(negate(uv), n), 1.0);
  const perp = scale(add(uv, scale(n, cosTheta)), etaRatio);
  const parallel = scale(n, -Math.sqrt(Math.abs(1.0 - lengthSquared(perp))));
  return add(perp, parallel);
}
