/**
 * Axis-aligned 2D box over the ground plane (x/y, height ignored).
 *
 * All containment and intersection tests include the edges, so a point on
 * a shared border belongs to both neighbours.
 */

export interface Point2 {
  readonly x: number;
  readonly y: number;
}

export class Bounds2 {
  constructor(
    readonly minX: number,
    readonly minY: number,
    readonly maxX: number,
    readonly maxY: number,
  ) {
    Object.freeze(this);
  }

  get centerX(): number {
    return (this.minX + this.maxX) / 2;
  }

  get centerY(): number {
    return (this.minY + this.maxY) / 2;
  }

  containsPoint(x: number, y: number): boolean {
    return x >= this.minX && x <= this.maxX && y >= this.minY && y <= this.maxY;
  }

  intersects(other: Bounds2): boolean {
    return (
      other.minX <= this.maxX &&
      other.maxX >= this.minX &&
      other.minY <= this.maxY &&
      other.maxY >= this.minY
    );
  }

  union(other: Bounds2): Bounds2 {
    return new Bounds2(
      Math.min(this.minX, other.minX),
      Math.min(this.minY, other.minY),
      Math.max(this.maxX, other.maxX),
      Math.max(this.maxY, other.maxY),
    );
  }

  /** Grow every side by `margin`. */
  expand(margin: number): Bounds2 {
    return new Bounds2(
      this.minX - margin,
      this.minY - margin,
      this.maxX + margin,
      this.maxY + margin,
    );
  }

  /** Split into four quadrants: [min/min, max/min, min/max, max/max]. */
  quadrants(): [Bounds2, Bounds2, Bounds2, Bounds2] {
    const cx = this.centerX;
    const cy = this.centerY;
    return [
      new Bounds2(this.minX, this.minY, cx, cy),
      new Bounds2(cx, this.minY, this.maxX, cy),
      new Bounds2(this.minX, cy, cx, this.maxY),
      new Bounds2(cx, cy, this.maxX, this.maxY),
    ];
  }

  /** Smallest box holding every point. Throws on an empty list. */
  static fromPoints(points: readonly Point2[]): Bounds2 {
    if (points.length === 0) {
      throw new Error('Cannot compute bounds of an empty point list');
    }
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const p of points) {
      if (p.x < minX) minX = p.x;
      if (p.y < minY) minY = p.y;
      if (p.x > maxX) maxX = p.x;
      if (p.y > maxY) maxY = p.y;
    }
    return new Bounds2(minX, minY, maxX, maxY);
  }
}
