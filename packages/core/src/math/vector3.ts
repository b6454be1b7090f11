/**
 * 3D position in Hammer units.
 *
 * Nav files store positions as three little-endian floats where
 *   x = east/west, y = north/south, z = up/down (height).
 *
 * Instances are frozen: decoded meshes hand these out to callers and must
 * not be changed behind the spatial index's back.
 */
export class Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;

  constructor(x = 0, y = 0, z = 0) {
    this.x = x;
    this.y = y;
    this.z = z;
    Object.freeze(this);
  }

  toArray(): [number, number, number] {
    return [this.x, this.y, this.z];
  }
}
