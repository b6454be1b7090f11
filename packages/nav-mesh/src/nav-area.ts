/**
 * One convex walkable polygon of the mesh.
 *
 * Corners carry their own heights, so the surface slopes across the
 * footprint. The 2D bounds are computed once here and reused by the
 * spatial index.
 */

import { Bounds2, Vector3 } from '@navkit/core';
import {
  EDGE_TOLERANCE,
  interpolateFan,
  interpolateQuad,
  interpolateTriangle,
  nearestCornerHeight,
  pointInConvexPolygon,
} from './area-geometry.js';
import { CorruptCountError, NonFiniteValueError } from './errors.js';
import { FULL_LIGHT } from './types.js';
import type {
  ApproachArea,
  EncounterPath,
  HidingSpot,
  LadderConnections,
  LightIntensity,
  NavConnections,
  VisibleArea,
} from './types.js';

/** Fewest corners an area footprint may have. */
export const MIN_AREA_CORNERS = 3;

/** Everything needed to build an area. Only `id` and `corners` are required. */
/** Throws NonFiniteValueError on the first NaN or infinite value. */
export function assertFiniteCoordinates(areaId: number, values: Iterable<number>, offset = -1): void {
  for (const value of values) {
    if (!Number.isFinite(value)) {
      throw new NonFiniteValueError(`Area ${areaId} corner coordinate`, value, offset);
    }
  }
}

export interface NavAreaInit {
  id: number;
  corners: readonly Vector3[];
  flags?: number;
  connections?: Partial<NavConnections>;
  hidingSpots?: readonly HidingSpot[];
  approachAreas?: readonly ApproachArea[];
  encounterPaths?: readonly EncounterPath[];
  placeIndex?: number;
  ladderConnections?: Partial<LadderConnections>;
  earliestOccupyTime?: readonly [number, number];
  lightIntensity?: LightIntensity;
  visibleAreas?: readonly VisibleArea[];
  inheritVisibilityFrom?: number;
  customData?: Uint8Array;
}

export class NavArea {
  readonly id: number;
  readonly flags: number;
  readonly corners: readonly Vector3[];
  /** Footprint box, edges included. */
  readonly bounds: Bounds2;
  readonly connections: NavConnections;
  readonly hidingSpots: readonly HidingSpot[];
  readonly approachAreas: readonly ApproachArea[];
  readonly encounterPaths: readonly EncounterPath[];
  /** 1-based index into the mesh's place table, 0 = unnamed. */
  readonly placeIndex: number;
  readonly ladderConnections: LadderConnections;
  readonly earliestOccupyTime: readonly [number, number];
  readonly lightIntensity: LightIntensity;
  readonly visibleAreas: readonly VisibleArea[];
  /** Area to copy visibility from, 0 = none. */
  readonly inheritVisibilityFrom: number;
  /** Game-specific bytes stored after each area record. */
  readonly customData: Uint8Array;

  constructor(init: NavAreaInit) {
    if (init.corners.length < MIN_AREA_CORNERS) {
      throw new CorruptCountError(
        `area ${init.id} corner`,
        init.corners.length,
        `at least ${MIN_AREA_CORNERS}`,
        -1,
      );
    }

    assertFiniteCoordinates(init.id, init.corners.flatMap((corner) => corner.toArray()));

    this.id = init.id;
    this.flags = init.flags ?? 0;
    this.corners = Object.freeze([...init.corners]);
    this.bounds = Bounds2.fromPoints(this.corners);

    const connections = init.connections ?? {};
    this.connections = Object.freeze({
      north: Object.freeze([...(connections.north ?? [])]),
      east: Object.freeze([...(connections.east ?? [])]),
      south: Object.freeze([...(connections.south ?? [])]),
      west: Object.freeze([...(connections.west ?? [])]),
    });

    const ladders = init.ladderConnections ?? {};
    this.ladderConnections = Object.freeze({
      up: Object.freeze([...(ladders.up ?? [])]),
      down: Object.freeze([...(ladders.down ?? [])]),
    });

    this.hidingSpots = Object.freeze([...(init.hidingSpots ?? [])]);
    this.approachAreas = Object.freeze([...(init.approachAreas ?? [])]);
    this.encounterPaths = Object.freeze([...(init.encounterPaths ?? [])]);
    this.placeIndex = init.placeIndex ?? 0;
    this.earliestOccupyTime = init.earliestOccupyTime ?? [0, 0];
    this.lightIntensity = init.lightIntensity ?? FULL_LIGHT;
    this.visibleAreas = Object.freeze([...(init.visibleAreas ?? [])]);
    this.inheritVisibilityFrom = init.inheritVisibilityFrom ?? 0;
    this.customData = init.customData ?? new Uint8Array(0);
    Object.freeze(this);
  }

  /**
   * Build the four-corner area the .nav layout describes: a north-west and
   * a south-east corner with their heights, plus the heights of the other
   * two corners.
   */
  static fromExtent(
    init: Omit<NavAreaInit, 'corners'>,
    northWest: Vector3,
    southEast: Vector3,
    northEastZ: number,
    southWestZ: number,
  ): NavArea {
    return new NavArea({
      ...init,
      corners: [
        northWest,
        new Vector3(southEast.x, northWest.y, northEastZ),
        southEast,
        new Vector3(northWest.x, southEast.y, southWestZ),
      ],
    });
  }

  /** Flag test for a single NavAttribute bit (or any of several). */
  hasAttribute(mask: number): boolean {
    return (this.flags & mask) !== 0;
  }

  /** Point-in-polygon on the footprint, edges included. */
  containsPoint(x: number, y: number): boolean {
    if (!this.bounds.expand(EDGE_TOLERANCE).containsPoint(x, y)) return false;
    return pointInConvexPolygon(x, y, this.corners);
  }

  /**
   * Surface height at (x, y). Quads interpolate bilinearly, triangles use
   * their plane and larger polygons a triangle fan. Points outside the
   * footprint are extrapolated, so callers check containsPoint first.
   */
  heightAt(x: number, y: number): number {
    const [a, b, c, d] = this.corners;
    if (a && b && c && d && this.corners.length === 4) {
      return interpolateQuad(x, y, [a, b, c, d]);
    }
    if (a && b && c && this.corners.length === 3) {
      return interpolateTriangle(x, y, a, b, c) ?? nearestCornerHeight(x, y, this.corners);
    }
    return interpolateFan(x, y, this.corners);
  }
}
