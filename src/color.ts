import { Interval } from "./interval";
import type { Color } from "./vec3";

const INTENSITY = new Interval(0.0, 0.999);

/** Gamma 2 transform; non-positive input maps to 0. */
export function linearToGamma(linear: number): number {
  if (linear > 0) {
    return Math.sqrt(linear);
  }
  return 0;
}

/** Gamma-corrects, clamps and quantizes a linear color to 0..255 per channel. */
export function toRgbBytes(color: Color): [number, number, number] {
  return [quantize(color[0]), quantize(color[1]), quantize(color[2])];
}

function quantize(channel: number): number {
  return Math.trunc(256 * INTENSITY.clamp(linearToGamma(channel)));
}

export function formatPixel(color: Color): string {
  const [r, g, b] = toRgbBytes(color);
  return `${r} ${g} ${b}`;
}
