/**
 * The decoded, immutable nav mesh.
 *
 * Areas are keyed by id and iterate in file order. Construction validates
 * every cross reference; a NavMesh that exists is always consistent.
 */

import { Bounds2 } from '@navkit/core';
import { AreaNotFoundError, DanglingReferenceError, DuplicateIdError } from './errors.js';
import type { NavArea } from './nav-area.js';
import { DEFAULT_NAV_MESH_HEADER, LADDER_DIRECTIONS, NAV_DIRECTIONS } from './types.js';
import type { NavLadder, NavMeshHeader } from './types.js';

export interface NavMeshParts {
  areas: readonly NavArea[];
  ladders?: readonly NavLadder[];
  /** Place names; an area's placeIndex N refers to places[N - 1]. */
  places?: readonly string[];
  header?: Partial<NavMeshHeader>;
}

/**
 * Byte offset of each area's record, parallel to `areas`. Lets validation
 * errors point back into the file.
 */
export type AreaOffsets = readonly number[];

export class NavMesh {
  readonly header: NavMeshHeader;
  readonly places: readonly string[];
  private readonly areaList: readonly NavArea[];
  private readonly areaById: ReadonlyMap<number, NavArea>;
  private readonly ladderList: readonly NavLadder[];
  private readonly ladderById: ReadonlyMap<number, NavLadder>;

  private constructor(parts: NavMeshParts, offsets: AreaOffsets | undefined) {
    this.header = Object.freeze({ ...DEFAULT_NAV_MESH_HEADER, ...parts.header });
    this.places = Object.freeze([...(parts.places ?? [])]);
    this.areaList = Object.freeze([...parts.areas]);
    this.ladderList = Object.freeze([...(parts.ladders ?? [])]);

    const areaById = new Map<number, NavArea>();
    for (const [i, area] of this.areaList.entries()) {
      if (areaById.has(area.id)) {
        throw new DuplicateIdError('area', area.id, offsets?.[i] ?? -1);
      }
      areaById.set(area.id, area);
    }
    this.areaById = areaById;

    const ladderById = new Map<number, NavLadder>();
    for (const ladder of this.ladderList) {
      if (ladderById.has(ladder.id)) {
        throw new DuplicateIdError('ladder', ladder.id);
      }
      ladderById.set(ladder.id, ladder);
    }
    this.ladderById = ladderById;

    this.validateReferences(offsets);
    Object.freeze(this);
  }

  /** Build and validate a mesh. Throws the first inconsistency found. */
  static fromParts(parts: NavMeshParts, offsets?: AreaOffsets): NavMesh {
    return new NavMesh(parts, offsets);
  }

  /** Shorthand for an in-memory mesh with no ladders or places. */
  static fromAreas(areas: readonly NavArea[]): NavMesh {
    return new NavMesh({ areas }, undefined);
  }

  get version(): number {
    return this.header.version;
  }

  get subVersion(): number {
    return this.header.subVersion;
  }

  get areaCount(): number {
    return this.areaList.length;
  }

  /** All areas in file order. */
  get areas(): readonly NavArea[] {
    return this.areaList;
  }

  get ladders(): readonly NavLadder[] {
    return this.ladderList;
  }

  hasArea(id: number): boolean {
    return this.areaById.has(id);
  }

  findArea(id: number): NavArea | undefined {
    return this.areaById.get(id);
  }

  getArea(id: number): NavArea {
    const area = this.areaById.get(id);
    if (!area) {
      throw new AreaNotFoundError(id);
    }
    return area;
  }

  findLadder(id: number): NavLadder | undefined {
    return this.ladderById.get(id);
  }

  /** Place name of an area, undefined for unnamed areas. */
  getPlaceName(area: NavArea): string | undefined {
    return area.placeIndex === 0 ? undefined : this.places[area.placeIndex - 1];
  }

  /** Footprint box of every area, or undefined for an empty mesh. */
  bounds(): Bounds2 | undefined {
    let result: Bounds2 | undefined;
    for (const area of this.areaList) {
      result = result ? result.union(area.bounds) : area.bounds;
    }
    return result;
  }

  /* ------------------------------------------------------------------ */
  /*  Validation                                                         */
  /* ------------------------------------------------------------------ */

  private validateReferences(offsets: AreaOffsets | undefined): void {
    for (const [i, area] of this.areaList.entries()) {
      const owner = `Area ${area.id}`;
      const at = offsets?.[i] ?? -1;
      const requireArea = (field: string, id: number, zeroMeansNone: boolean): void => {
        if (zeroMeansNone && id === 0) return;
        if (!this.areaById.has(id)) {
          throw new DanglingReferenceError(owner, field, id, at);
        }
      };

      for (const dir of NAV_DIRECTIONS) {
        for (const target of area.connections[dir]) {
          requireArea(`${dir} connection`, target, false);
        }
      }

      for (const approach of area.approachAreas) {
        requireArea('approach here', approach.hereAreaId, true);
        requireArea('approach previous', approach.previousAreaId, true);
        requireArea('approach next', approach.nextAreaId, true);
      }

      for (const path of area.encounterPaths) {
        requireArea('encounter path start', path.fromAreaId, true);
        requireArea('encounter path end', path.toAreaId, true);
      }

      for (const visible of area.visibleAreas) {
        requireArea('visible area', visible.areaId, false);
      }
      requireArea('inherited visibility', area.inheritVisibilityFrom, true);

      for (const dir of LADDER_DIRECTIONS) {
        for (const ladderId of area.ladderConnections[dir]) {
          if (!this.ladderById.has(ladderId)) {
            throw new DanglingReferenceError(owner, `${dir} ladder`, ladderId, at);
          }
        }
      }

      if (area.placeIndex > this.places.length) {
        throw new DanglingReferenceError(owner, 'place', area.placeIndex, at);
      }
    }

    for (const ladder of this.ladderList) {
      const owner = `Ladder ${ladder.id}`;
      const links: [string, number][] = [
        ['top forward area', ladder.topForwardAreaId],
        ['top left area', ladder.topLeftAreaId],
        ['top right area', ladder.topRightAreaId],
        ['top behind area', ladder.topBehindAreaId],
        ['bottom area', ladder.bottomAreaId],
      ];
      for (const [field, id] of links) {
        if (id !== 0 && !this.areaById.has(id)) {
          throw new DanglingReferenceError(owner, field, id);
        }
      }
    }
  }
}
