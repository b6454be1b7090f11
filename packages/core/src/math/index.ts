export { Vector3 } from './vector3.js';
export { Bounds2 } from './bounds2.js';
export type { Point2 } from './bounds2.js';
export { clamp, lerp, bilerp, cross2 } from './scalar.js';
