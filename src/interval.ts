/**
 * Real interval used for valid hit distances and channel clamping.
 */
export class Interval {
  constructor(
    public readonly min: number,
    public readonly max: number
  ) {}

  /** Exclusive on both ends. */
  surrounds(x: number): boolean {
    return this.min < x && x < this.max;
  }

  clamp(x: number): number {
    if (x < this.min) return this.min;
    if (x > this.max) return this.max;
    return x;
  }
}
