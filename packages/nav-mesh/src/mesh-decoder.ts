/**
 * Top-level .nav file decoder.
 *
 * Layout (all little-endian):
 *   u32 magic 0xFEEDFACE
 *   u32 version             (6..16)
 *   u32 sub-version         (version >= 10)
 *   u32 BSP size
 *   u8  analyzed flag       (version >= 14)
 *   u16 place count, each a u16-length-prefixed name
 *   u8  has-unnamed-areas   (version >= 12)
 *   u32 area count, each an area record
 *   u32 ladder count, each a ladder record
 *   game-specific trailer (ignored)
 *
 * The whole buffer is read before anything is validated, and a mesh is only
 * returned once every reference resolves.
 */

import { ByteCursor } from './byte-cursor.js';
import type { ByteSource } from './byte-cursor.js';
import { InvalidMagicError, UnsupportedVersionError } from './errors.js';
import {
  formatFeatures,
  isSupportedVersion,
  ladderRecordSize,
  minAreaRecordSize,
  NAV_LIMITS,
  NAV_MAGIC,
} from './format.js';
import type { NavFormatFeatures } from './format.js';
import { NavArea, assertFiniteCoordinates } from './nav-area.js';
import { NavMesh } from './nav-mesh.js';
import { FULL_LIGHT, LADDER_DIRECTIONS, NAV_DIRECTIONS } from './types.js';
import type {
  ApproachArea,
  EncounterPath,
  EncounterSpot,
  HidingSpot,
  LadderConnections,
  LightIntensity,
  NavConnections,
  NavLadder,
  VisibleArea,
} from './types.js';

/** Decoder settings. */
export interface DecodeOptions {
  /**
   * Bytes of game-specific data after every area record. Team Fortress 2
   * writes a u32 attribute word there; stock Source games write nothing.
   */
  customAreaDataSize: number;
}

export const DEFAULT_DECODE_OPTIONS: Readonly<DecodeOptions> = {
  customAreaDataSize: 4,
};

/** Encoded sizes of fixed-width list elements. */
const HIDING_SPOT_SIZE = 4 + 12 + 1;
const APPROACH_AREA_SIZE = 4 + 4 + 1 + 4 + 1;
const ENCOUNTER_PATH_MIN_SIZE = 4 + 1 + 4 + 1 + 1;
const ENCOUNTER_SPOT_SIZE = 4 + 1;
const VISIBLE_AREA_SIZE = 4 + 1;

/**
 * Decode a complete .nav file.
 *
 * Throws a NavDecodeError subclass on any malformed input; never returns a
 * partially populated mesh.
 */
export function decodeNavMesh(bytes: ByteSource, options: Partial<DecodeOptions> = {}): NavMesh {
  const opts: DecodeOptions = { ...DEFAULT_DECODE_OPTIONS, ...options };
  if (!Number.isInteger(opts.customAreaDataSize) || opts.customAreaDataSize < 0) {
    throw new RangeError(`customAreaDataSize must be a non-negative integer, got ${opts.customAreaDataSize}`);
  }

  const cursor = new ByteCursor(bytes);

  const magic = cursor.readUint32('magic number');
  if (magic !== NAV_MAGIC) {
    throw new InvalidMagicError(magic);
  }

  const versionOffset = cursor.position;
  const version = cursor.readUint32('version');
  if (!isSupportedVersion(version)) {
    throw new UnsupportedVersionError(version, versionOffset);
  }
  const features = formatFeatures(version);

  const subVersion = features.hasSubVersion ? cursor.readUint32('sub-version') : 0;
  const bspSize = cursor.readUint32('BSP size');
  const isAnalyzed = features.hasAnalyzedFlag ? cursor.readBool('analyzed flag') : false;

  const places = readPlaces(cursor);
  const hasUnnamedAreas = features.hasUnnamedAreasFlag ? cursor.readBool('unnamed areas flag') : false;

  const areaCount = cursor.readCount(
    4,
    'area',
    NAV_LIMITS.areas,
    minAreaRecordSize(features, opts.customAreaDataSize),
  );
  const areas: NavArea[] = [];
  const offsets: number[] = [];
  for (let i = 0; i < areaCount; i++) {
    offsets.push(cursor.position);
    areas.push(readArea(cursor, features, opts));
  }

  const ladderCount = cursor.readCount(4, 'ladder', NAV_LIMITS.ladders, ladderRecordSize(features));
  const ladders: NavLadder[] = [];
  for (let i = 0; i < ladderCount; i++) {
    ladders.push(readLadder(cursor, features));
  }

  return NavMesh.fromParts(
    {
      areas,
      ladders,
      places,
      header: {
        version,
        subVersion,
        bspSize,
        isAnalyzed,
        hasUnnamedAreas,
        trailingBytes: cursor.remaining,
      },
    },
    offsets,
  );
}

/* ------------------------------------------------------------------ */
/*  Section readers                                                    */
/* ------------------------------------------------------------------ */

function readPlaces(cursor: ByteCursor): string[] {
  // Each entry is at least its u16 length prefix.
  const count = cursor.readCount(2, 'place', 0xffff, 2);
  const places: string[] = [];
  for (let i = 0; i < count; i++) {
    places.push(cursor.readString('place name'));
  }
  return places;
}

function readArea(cursor: ByteCursor, features: NavFormatFeatures, opts: DecodeOptions): NavArea {
  const start = cursor.position;
  const id = cursor.readUint32('area id');
  const flags = readAttributeFlags(cursor, features);

  const northWest = cursor.readVector3('north-west corner');
  const southEast = cursor.readVector3('south-east corner');
  const northEastZ = cursor.readFloat32('north-east height');
  const southWestZ = cursor.readFloat32('south-west height');
  assertFiniteCoordinates(id, [...northWest.toArray(), ...southEast.toArray(), northEastZ, southWestZ], start);

  const connections = readConnections(cursor);
  const hidingSpots = readHidingSpots(cursor);
  const approachAreas = features.hasApproachAreas ? readApproachAreas(cursor) : [];
  const encounterPaths = readEncounterPaths(cursor);

  const placeIndex = cursor.readUint16('place index');
  const ladderConnections = readLadderConnections(cursor);
  const earliestOccupyTime: [number, number] = [
    cursor.readFloat32('earliest occupy time'),
    cursor.readFloat32('earliest occupy time'),
  ];

  const lightIntensity = features.hasLightIntensity ? readLightIntensity(cursor) : FULL_LIGHT;

  let visibleAreas: VisibleArea[] = [];
  let inheritVisibilityFrom = 0;
  if (features.hasVisibility) {
    visibleAreas = readVisibleAreas(cursor);
    inheritVisibilityFrom = cursor.readUint32('inherited visibility area');
  }

  const customData = cursor.readBytes(opts.customAreaDataSize, 'custom area data');

  return NavArea.fromExtent(
    {
      id,
      flags,
      connections,
      hidingSpots,
      approachAreas,
      encounterPaths,
      placeIndex,
      ladderConnections,
      earliestOccupyTime,
      lightIntensity,
      visibleAreas,
      inheritVisibilityFrom,
      customData,
    },
    northWest,
    southEast,
    northEastZ,
    southWestZ,
  );
}

function readAttributeFlags(cursor: ByteCursor, features: NavFormatFeatures): number {
  switch (features.attributeFlagsSize) {
    case 1:
      return cursor.readUint8('attribute flags');
    case 2:
      return cursor.readUint16('attribute flags');
    case 4:
      return cursor.readUint32('attribute flags');
  }
}

function readIdList(cursor: ByteCursor, what: string, max: number): number[] {
  const count = cursor.readCount(4, what, max, 4);
  const ids: number[] = [];
  for (let i = 0; i < count; i++) {
    ids.push(cursor.readUint32(what));
  }
  return ids;
}

function readConnections(cursor: ByteCursor): NavConnections {
  const lists: number[][] = [];
  for (const dir of NAV_DIRECTIONS) {
    lists.push(readIdList(cursor, `${dir} connection`, NAV_LIMITS.connectionsPerDirection));
  }
  const [north = [], east = [], south = [], west = []] = lists;
  return { north, east, south, west };
}

function readLadderConnections(cursor: ByteCursor): LadderConnections {
  const lists: number[][] = [];
  for (const dir of LADDER_DIRECTIONS) {
    lists.push(readIdList(cursor, `${dir} ladder connection`, NAV_LIMITS.ladderConnectionsPerDirection));
  }
  const [up = [], down = []] = lists;
  return { up, down };
}

function readHidingSpots(cursor: ByteCursor): HidingSpot[] {
  const count = cursor.readCount(1, 'hiding spot', 0xff, HIDING_SPOT_SIZE);
  const spots: HidingSpot[] = [];
  for (let i = 0; i < count; i++) {
    spots.push({
      id: cursor.readUint32('hiding spot id'),
      position: cursor.readVector3('hiding spot position'),
      flags: cursor.readUint8('hiding spot flags'),
    });
  }
  return spots;
}

function readApproachAreas(cursor: ByteCursor): ApproachArea[] {
  const count = cursor.readCount(1, 'approach area', 0xff, APPROACH_AREA_SIZE);
  const approaches: ApproachArea[] = [];
  for (let i = 0; i < count; i++) {
    approaches.push({
      hereAreaId: cursor.readUint32('approach here'),
      previousAreaId: cursor.readUint32('approach previous'),
      previousHow: cursor.readUint8('approach previous how'),
      nextAreaId: cursor.readUint32('approach next'),
      nextHow: cursor.readUint8('approach next how'),
    });
  }
  return approaches;
}

function readEncounterPaths(cursor: ByteCursor): EncounterPath[] {
  const count = cursor.readCount(4, 'encounter path', NAV_LIMITS.encounterPaths, ENCOUNTER_PATH_MIN_SIZE);
  const paths: EncounterPath[] = [];
  for (let i = 0; i < count; i++) {
    const fromAreaId = cursor.readUint32('encounter path start');
    const fromDirection = cursor.readUint8('encounter path start direction');
    const toAreaId = cursor.readUint32('encounter path end');
    const toDirection = cursor.readUint8('encounter path end direction');

    const spotCount = cursor.readCount(1, 'encounter spot', 0xff, ENCOUNTER_SPOT_SIZE);
    const spots: EncounterSpot[] = [];
    for (let j = 0; j < spotCount; j++) {
      spots.push({
        spotId: cursor.readUint32('encounter spot id'),
        t: cursor.readUint8('encounter spot distance') / 255,
      });
    }

    paths.push({ fromAreaId, fromDirection, toAreaId, toDirection, spots });
  }
  return paths;
}

function readLightIntensity(cursor: ByteCursor): LightIntensity {
  return {
    northWest: cursor.readFloat32('light intensity'),
    northEast: cursor.readFloat32('light intensity'),
    southEast: cursor.readFloat32('light intensity'),
    southWest: cursor.readFloat32('light intensity'),
  };
}

function readVisibleAreas(cursor: ByteCursor): VisibleArea[] {
  const count = cursor.readCount(4, 'visible area', NAV_LIMITS.visibleAreas, VISIBLE_AREA_SIZE);
  const visible: VisibleArea[] = [];
  for (let i = 0; i < count; i++) {
    visible.push({
      areaId: cursor.readUint32('visible area id'),
      attributes: cursor.readUint8('visible area attributes'),
    });
  }
  return visible;
}

function readLadder(cursor: ByteCursor, features: NavFormatFeatures): NavLadder {
  const id = cursor.readUint32('ladder id');
  const width = cursor.readFloat32('ladder width');
  const top = cursor.readVector3('ladder top');
  const bottom = cursor.readVector3('ladder bottom');
  const length = cursor.readFloat32('ladder length');
  const direction = cursor.readUint32('ladder direction');
  const isDangling = features.hasLadderDanglingFlag ? cursor.readBool('ladder dangling flag') : false;

  return Object.freeze({
    id,
    width,
    top,
    bottom,
    length,
    direction,
    isDangling,
    topForwardAreaId: cursor.readUint32('ladder top forward area'),
    topLeftAreaId: cursor.readUint32('ladder top left area'),
    topRightAreaId: cursor.readUint32('ladder top right area'),
    topBehindAreaId: cursor.readUint32('ladder top behind area'),
    bottomAreaId: cursor.readUint32('ladder bottom area'),
  });
}
