/**
 * Footprint tests and height interpolation over an area's corner polygon.
 *
 * Corners are taken in order around the polygon; either winding works.
 * Only x/y decide containment, z is the surface height at each corner.
 */

import { bilerp, clamp, cross2 } from '@navkit/core';
import type { Vector3 } from '@navkit/core';

/** Distance (in units) a point may sit outside an edge and still count as on it. */
export const EDGE_TOLERANCE = 1e-3;

/** Parametric slack when checking inverse-bilinear and barycentric results. */
const PARAM_TOLERANCE = 1e-6;

/** Below this, a 2D cross product is treated as zero. */
const DEGENERATE_EPSILON = 1e-9;

/**
 * Whether (x, y) lies inside or on the edge of a convex polygon.
 *
 * Every edge must see the point on the same side. Zero-length edges say
 * nothing and are skipped, so callers should reject points outside the
 * polygon's bounds first.
 */
export function pointInConvexPolygon(
  x: number,
  y: number,
  corners: readonly Vector3[],
  tolerance = EDGE_TOLERANCE,
): boolean {
  let hasPositive = false;
  let hasNegative = false;
  const n = corners.length;

  for (let i = 0; i < n; i++) {
    const a = corners[i];
    const b = corners[(i + 1) % n];
    if (!a || !b) continue;
    const ex = b.x - a.x;
    const ey = b.y - a.y;
    const edgeLength = Math.hypot(ex, ey);
    if (edgeLength === 0) continue;

    const side = cross2(ex, ey, x - a.x, y - a.y);
    const slack = tolerance * edgeLength;
    if (side > slack) hasPositive = true;
    else if (side < -slack) hasNegative = true;

    if (hasPositive && hasNegative) return false;
  }
  return true;
}

/**
 * Barycentric weights of (x, y) in triangle a-b-c, or undefined when the
 * triangle has no area.
 */
export function barycentric(
  x: number,
  y: number,
  a: Vector3,
  b: Vector3,
  c: Vector3,
): [number, number, number] | undefined {
  const area = cross2(b.x - a.x, b.y - a.y, c.x - a.x, c.y - a.y);
  if (Math.abs(area) < DEGENERATE_EPSILON) return undefined;
  const wa = cross2(b.x - x, b.y - y, c.x - x, c.y - y) / area;
  const wb = cross2(c.x - x, c.y - y, a.x - x, a.y - y) / area;
  return [wa, wb, 1 - wa - wb];
}

/** Height of the plane through a, b and c at (x, y). */
export function interpolateTriangle(x: number, y: number, a: Vector3, b: Vector3, c: Vector3): number | undefined {
  const weights = barycentric(x, y, a, b, c);
  if (!weights) return undefined;
  const [wa, wb, wc] = weights;
  return wa * a.z + wb * b.z + wc * c.z;
}

/**
 * Map (x, y) into the quad a-b-c-d as (u, v) so that
 *   p = a + (b - a)u + (d - a)v + (a - b + c - d)uv.
 *
 * Returns undefined when the quad is too degenerate to invert.
 */
export function inverseBilinear(
  x: number,
  y: number,
  a: Vector3,
  b: Vector3,
  c: Vector3,
  d: Vector3,
): [number, number] | undefined {
  const ex = b.x - a.x;
  const ey = b.y - a.y;
  const fx = d.x - a.x;
  const fy = d.y - a.y;
  const gx = a.x - b.x + c.x - d.x;
  const gy = a.y - b.y + c.y - d.y;
  const hx = x - a.x;
  const hy = y - a.y;

  const k2 = cross2(gx, gy, fx, fy);
  const k1 = cross2(ex, ey, fx, fy) + cross2(hx, hy, gx, gy);
  const k0 = cross2(hx, hy, ex, ey);

  const solveU = (v: number): number | undefined => {
    const denomX = ex + gx * v;
    const denomY = ey + gy * v;
    if (Math.abs(denomX) >= Math.abs(denomY)) {
      return Math.abs(denomX) < DEGENERATE_EPSILON ? undefined : (hx - fx * v) / denomX;
    }
    return (hy - fy * v) / denomY;
  };

  // Parallelogram (and any quad with parallel opposite sides): linear in v
  if (Math.abs(k2) < DEGENERATE_EPSILON) {
    if (Math.abs(k1) < DEGENERATE_EPSILON) return undefined;
    const v = -k0 / k1;
    const u = solveU(v);
    return u === undefined ? undefined : [u, v];
  }

  const discriminant = k1 * k1 - 4 * k0 * k2;
  if (discriminant < 0) return undefined;
  const root = Math.sqrt(discriminant);
  const inv = 0.5 / k2;

  let best: [number, number] | undefined;
  let bestOutside = Infinity;
  for (const v of [(-k1 - root) * inv, (-k1 + root) * inv]) {
    const u = solveU(v);
    if (u === undefined) continue;
    const outside = distanceOutsideUnit(u) + distanceOutsideUnit(v);
    if (outside < bestOutside) {
      best = [u, v];
      bestOutside = outside;
    }
  }
  return best;
}

function distanceOutsideUnit(t: number): number {
  return t < 0 ? -t : t > 1 ? t - 1 : 0;
}

/**
 * Bilinear height over a four-corner area. The point's position inside the
 * quad's own axes (corner 0 → 1 and corner 0 → 3) drives the blend, so
 * rotated or skewed quads interpolate the same way axis-aligned ones do.
 */
export function interpolateQuad(x: number, y: number, corners: readonly [Vector3, Vector3, Vector3, Vector3]): number {
  const [a, b, c, d] = corners;
  const uv = inverseBilinear(x, y, a, b, c, d);
  if (!uv) return interpolateFan(x, y, corners);
  const u = clamp(uv[0], 0, 1);
  const v = clamp(uv[1], 0, 1);
  return bilerp(a.z, b.z, c.z, d.z, u, v);
}

/**
 * Height over a general convex polygon: split into a triangle fan from
 * corner 0 and use the plane of the triangle that holds the point (or, for
 * a point on a sliver between triangles, the one it is least outside of).
 */
export function interpolateFan(x: number, y: number, corners: readonly Vector3[]): number {
  const origin = corners[0];
  if (!origin) {
    throw new RangeError('Cannot interpolate over an empty polygon');
  }

  let bestHeight: number | undefined;
  let bestScore = -Infinity;
  for (let i = 1; i + 1 < corners.length; i++) {
    const b = corners[i];
    const c = corners[i + 1];
    if (!b || !c) continue;
    const weights = barycentric(x, y, origin, b, c);
    if (!weights) continue;
    const score = Math.min(...weights);
    if (score > bestScore) {
      bestScore = score;
      bestHeight = weights[0] * origin.z + weights[1] * b.z + weights[2] * c.z;
      if (score >= -PARAM_TOLERANCE) break;
    }
  }

  return bestHeight ?? nearestCornerHeight(x, y, corners);
}

/** Height of the corner closest to (x, y) on the ground plane. */
export function nearestCornerHeight(x: number, y: number, corners: readonly Vector3[]): number {
  let best = Infinity;
  let height = 0;
  for (const corner of corners) {
    const distSq = (corner.x - x) ** 2 + (corner.y - y) ** 2;
    if (distSq < best) {
      best = distSq;
      height = corner.z;
    }
  }
  return height;
}
