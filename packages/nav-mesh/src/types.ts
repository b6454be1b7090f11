/**
 * Nav mesh data types and constants.
 *
 * These follow the Source engine .nav layout. Positions are Hammer units,
 * Z-up: x = east/west, y = north/south, z = height.
 */

import type { Vector3 } from '@navkit/core';

// ============================================================================
// Directions and attribute bits
// ============================================================================

/** Connection directions, in the order the file stores their lists. */
export const NAV_DIRECTIONS = ['north', 'east', 'south', 'west'] as const;
export type NavDirection = (typeof NAV_DIRECTIONS)[number];

/** Ladder connection directions, in file order. */
export const LADDER_DIRECTIONS = ['up', 'down'] as const;
export type LadderDirection = (typeof LADDER_DIRECTIONS)[number];

/** Well-known bits of an area's attribute flags. Unknown bits are kept as-is. */
export const NavAttribute = {
  CROUCH: 0x0001,
  JUMP: 0x0002,
  PRECISE: 0x0004,
  NO_JUMP: 0x0008,
  STOP: 0x0010,
  RUN: 0x0020,
  WALK: 0x0040,
  AVOID: 0x0080,
  TRANSIENT: 0x0100,
  DONT_HIDE: 0x0200,
  STAND: 0x0400,
  NO_HOSTAGES: 0x0800,
  STAIRS: 0x1000,
  NO_MERGE: 0x2000,
  OBSTACLE_TOP: 0x4000,
  CLIFF: 0x8000,
} as const;

// ============================================================================
// Per-area metadata (stored verbatim, not interpreted)
// ============================================================================

/** Target area ids per direction. */
export type NavConnections = Readonly<Record<NavDirection, readonly number[]>>;

/** Ladder ids per direction. */
export type LadderConnections = Readonly<Record<LadderDirection, readonly number[]>>;

export interface HidingSpot {
  readonly id: number;
  readonly position: Vector3;
  readonly flags: number;
}

/** Pre-computed approach route through an area (files before version 15). */
export interface ApproachArea {
  readonly hereAreaId: number;
  readonly previousAreaId: number;
  readonly previousHow: number;
  readonly nextAreaId: number;
  readonly nextHow: number;
}

export interface EncounterSpot {
  /** Hiding spot id. */
  readonly spotId: number;
  /** Parametric distance along the path, 0..1 (stored as byte / 255). */
  readonly t: number;
}

export interface EncounterPath {
  readonly fromAreaId: number;
  readonly fromDirection: number;
  readonly toAreaId: number;
  readonly toDirection: number;
  readonly spots: readonly EncounterSpot[];
}

/** Light level at each corner (files from version 11). */
export interface LightIntensity {
  readonly northWest: number;
  readonly northEast: number;
  readonly southEast: number;
  readonly southWest: number;
}

export interface VisibleArea {
  readonly areaId: number;
  readonly attributes: number;
}

// ============================================================================
// Global tables
// ============================================================================

export interface NavLadder {
  readonly id: number;
  readonly width: number;
  readonly top: Vector3;
  readonly bottom: Vector3;
  readonly length: number;
  /** Facing direction, an index into NAV_DIRECTIONS. */
  readonly direction: number;
  /** Only stored by version 6 files. */
  readonly isDangling: boolean;
  /** Connected area ids, 0 = none. */
  readonly topForwardAreaId: number;
  readonly topLeftAreaId: number;
  readonly topRightAreaId: number;
  readonly topBehindAreaId: number;
  readonly bottomAreaId: number;
}

/** File-level header values. */
export interface NavMeshHeader {
  readonly version: number;
  /** Game-specific minor version, 0 before version 10. */
  readonly subVersion: number;
  /** Size of the BSP file the mesh was generated for. */
  readonly bspSize: number;
  readonly isAnalyzed: boolean;
  readonly hasUnnamedAreas: boolean;
  /** Bytes after the ladder table, left to the game. */
  readonly trailingBytes: number;
}

/** Header values for a mesh built in memory. */
export const DEFAULT_NAV_MESH_HEADER: Readonly<NavMeshHeader> = {
  version: 16,
  subVersion: 0,
  bspSize: 0,
  isAnalyzed: false,
  hasUnnamedAreas: false,
  trailingBytes: 0,
};

/** Light intensity for files that predate the per-corner light block. */
export const FULL_LIGHT: LightIntensity = Object.freeze({
  northWest: 1,
  northEast: 1,
  southEast: 1,
  southWest: 1,
});
