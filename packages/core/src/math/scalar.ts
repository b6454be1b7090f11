/** Clamp value to range. */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/** Linear interpolation. */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/** Bilinear blend of four corner values at (u, v) in the unit square. */
export function bilerp(v00: number, v10: number, v11: number, v01: number, u: number, v: number): number {
  return lerp(lerp(v00, v10, u), lerp(v01, v11, u), v);
}

/** Z component of the 2D cross product (a.x * b.y - a.y * b.x). */
export function cross2(ax: number, ay: number, bx: number, by: number): number {
  return ax * by - ay * bx;
}
