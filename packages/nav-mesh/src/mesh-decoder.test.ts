import { describe, it, expect } from 'vitest';
import { decodeNavMesh } from './mesh-decoder.js';
import {
  CorruptCountError,
  DanglingReferenceError,
  DuplicateIdError,
  InvalidMagicError,
  NonFiniteValueError,
  UnexpectedEofError,
  UnsupportedVersionError,
} from './errors.js';
import { formatFeatures, minAreaRecordSize } from './format.js';
import { FULL_LIGHT, NavAttribute } from './types.js';
import { flatArea, writeNavFile } from './testing/nav-file-writer.js';
import type { LadderSpec, NavFileSpec } from './testing/nav-file-writer.js';

/** Byte offset of the first area record in a v16 file without places. */
const FIRST_AREA_OFFSET_V16 = 4 + 4 + 4 + 4 + 1 + 2 + 1 + 4;

function decodeError(bytes: Uint8Array): unknown {
  try {
    decodeNavMesh(bytes);
  } catch (err) {
    return err;
  }
  throw new Error('expected decoding to fail');
}

/** Two areas joined east-west, with most optional blocks filled in. */
function detailedSpec(version: number): NavFileSpec {
  return {
    version,
    subVersion: 3,
    bspSize: 123456,
    isAnalyzed: true,
    hasUnnamedAreas: true,
    places: ['Bridge', 'Courtyard'],
    areas: [
      flatArea(1, 0, 0, 50, 5, {
        flags: NavAttribute.CROUCH | NavAttribute.WALK,
        connections: { east: [2] },
        hidingSpots: [{ id: 3, position: [10, 20, 5], flags: 2 }],
        approachAreas: [{ here: 1, previous: 2, previousHow: 1, next: 2, nextHow: 3 }],
        encounterPaths: [
          {
            from: 1,
            fromDirection: 1,
            to: 2,
            toDirection: 3,
            spots: [
              { spotId: 3, t: 255 },
              { spotId: 3, t: 51 },
            ],
          },
        ],
        placeIndex: 2,
        ladderConnections: { up: [7] },
        earliestOccupyTime: [1.5, 2.5],
        lightIntensity: [0.5, 0.25, 0.75, 1],
        visibleAreas: [{ areaId: 2, attributes: 1 }],
        inheritVisibilityFrom: 2,
        customData: [1, 2, 3, 4],
      }),
      flatArea(2, 50, 0, 50, 5, { connections: { west: [1] }, ladderConnections: { down: [7] } }),
    ],
    ladders: [
      {
        id: 7,
        width: 20,
        top: [10, 10, 100],
        bottom: [10, 10, 0],
        direction: 2,
        isDangling: true,
        topForwardArea: 2,
        bottomArea: 1,
      },
    ],
  };
}

describe('decodeNavMesh', () => {
  describe('header and areas', () => {
    it('decodes a current-version file', () => {
      const mesh = decodeNavMesh(writeNavFile(detailedSpec(16)));

      expect(mesh.header).toEqual({
        version: 16,
        subVersion: 3,
        bspSize: 123456,
        isAnalyzed: true,
        hasUnnamedAreas: true,
        trailingBytes: 0,
      });
      expect(mesh.places).toEqual(['Bridge', 'Courtyard']);
      expect(mesh.areas.map((area) => area.id)).toEqual([1, 2]);
    });

    it('builds the four corners from the stored extent', () => {
      const mesh = decodeNavMesh(
        writeNavFile({
          areas: [{ id: 4, northWest: [0, 0, 1], southEast: [10, 20, 3], northEastZ: 2, southWestZ: 4 }],
        }),
      );
      const area = mesh.getArea(4);
      expect(area.corners.map((c) => c.toArray())).toEqual([
        [0, 0, 1],
        [10, 0, 2],
        [10, 20, 3],
        [0, 20, 4],
      ]);
      expect(area.bounds.minX).toBe(0);
      expect(area.bounds.maxY).toBe(20);
    });

    it('keeps per-area metadata', () => {
      const mesh = decodeNavMesh(writeNavFile(detailedSpec(16)));
      const area = mesh.getArea(1);

      expect(area.hasAttribute(NavAttribute.CROUCH)).toBe(true);
      expect(area.hasAttribute(NavAttribute.JUMP)).toBe(false);
      expect(area.connections.east).toEqual([2]);
      expect(area.connections.north).toEqual([]);
      expect(area.hidingSpots).toHaveLength(1);
      expect(area.hidingSpots[0]?.id).toBe(3);
      expect(area.hidingSpots[0]?.position.toArray()).toEqual([10, 20, 5]);
      expect(area.hidingSpots[0]?.flags).toBe(2);

      const path = area.encounterPaths[0];
      expect(path?.fromAreaId).toBe(1);
      expect(path?.toDirection).toBe(3);
      expect(path?.spots.map((spot) => spot.t)).toEqual([1, 51 / 255]);

      expect(mesh.getPlaceName(area)).toBe('Courtyard');
      expect(mesh.getPlaceName(mesh.getArea(2))).toBeUndefined();
      expect(area.ladderConnections.up).toEqual([7]);
      expect(area.earliestOccupyTime).toEqual([1.5, 2.5]);
      expect(area.lightIntensity).toEqual({ northWest: 0.5, northEast: 0.25, southEast: 0.75, southWest: 1 });
      expect(area.visibleAreas).toEqual([{ areaId: 2, attributes: 1 }]);
      expect(area.inheritVisibilityFrom).toBe(2);
      expect(Array.from(area.customData)).toEqual([1, 2, 3, 4]);
    });

    it('decodes the ladder table', () => {
      const mesh = decodeNavMesh(writeNavFile(detailedSpec(16)));
      const ladder = mesh.findLadder(7);

      expect(ladder?.width).toBe(20);
      expect(ladder?.length).toBe(100);
      expect(ladder?.direction).toBe(2);
      expect(ladder?.top.toArray()).toEqual([10, 10, 100]);
      expect(ladder?.bottom.toArray()).toEqual([10, 10, 0]);
      expect(ladder?.topForwardAreaId).toBe(2);
      expect(ladder?.topLeftAreaId).toBe(0);
      expect(ladder?.bottomAreaId).toBe(1);
      // Only version 6 stores the flag
      expect(ladder?.isDangling).toBe(false);
    });

    it('decodes an empty mesh', () => {
      const mesh = decodeNavMesh(writeNavFile({}));
      expect(mesh.areaCount).toBe(0);
      expect(mesh.ladders).toEqual([]);
      expect(mesh.bounds()).toBeUndefined();
    });
  });

  describe('version gating', () => {
    for (let version = 6; version <= 16; version++) {
      it(`reads the version ${version} layout`, () => {
        const mesh = decodeNavMesh(writeNavFile(detailedSpec(version)));
        const area = mesh.getArea(1);

        expect(mesh.version).toBe(version);
        expect(mesh.subVersion).toBe(version >= 10 ? 3 : 0);
        expect(mesh.header.isAnalyzed).toBe(version >= 14);
        expect(mesh.header.hasUnnamedAreas).toBe(version >= 12);
        expect(area.flags).toBe(NavAttribute.CROUCH | NavAttribute.WALK);
        expect(area.approachAreas).toHaveLength(version < 15 ? 1 : 0);
        expect(area.lightIntensity).toEqual(
          version >= 11 ? { northWest: 0.5, northEast: 0.25, southEast: 0.75, southWest: 1 } : FULL_LIGHT,
        );
        expect(area.visibleAreas).toHaveLength(version >= 16 ? 1 : 0);
        expect(area.inheritVisibilityFrom).toBe(version >= 16 ? 2 : 0);
        expect(mesh.findLadder(7)?.isDangling).toBe(version === 6);
        expect(mesh.header.trailingBytes).toBe(0);
      });
    }

    it('reads approach areas field by field', () => {
      const mesh = decodeNavMesh(writeNavFile(detailedSpec(14)));
      expect(mesh.getArea(1).approachAreas).toEqual([
        { hereAreaId: 1, previousAreaId: 2, previousHow: 1, nextAreaId: 2, nextHow: 3 },
      ]);
    });

    it('keeps wide attribute flags from version 13 on', () => {
      const mesh = decodeNavMesh(writeNavFile({ version: 13, areas: [flatArea(1, 0, 0, 10, 0, { flags: 0x12345 })] }));
      expect(mesh.getArea(1).flags).toBe(0x12345);
    });

    it('sizes the smallest area record per version', () => {
      expect(minAreaRecordSize(formatFeatures(16), 4)).toBe(107);
      expect(minAreaRecordSize(formatFeatures(6), 0)).toBe(4 + 1 + 32 + 16 + 1 + 1 + 4 + 2 + 8 + 8);
    });
  });

  describe('buffers and options', () => {
    it('decodes from a Buffer slice with a non-zero byte offset', () => {
      const file = writeNavFile(detailedSpec(16));
      const padded = Buffer.concat([Buffer.from([7, 7, 7]), Buffer.from(file), Buffer.from([9])]);
      const mesh = decodeNavMesh(padded.subarray(3, 3 + file.length));
      expect(mesh.areas.map((area) => area.id)).toEqual([1, 2]);
      expect(mesh.header.trailingBytes).toBe(0);
    });

    it('decodes from an ArrayBuffer', () => {
      const file = writeNavFile(detailedSpec(16));
      const buffer = new ArrayBuffer(file.length);
      new Uint8Array(buffer).set(file);
      const mesh = decodeNavMesh(buffer);
      expect(mesh.areaCount).toBe(2);
    });

    it('leaves game-specific trailing bytes alone', () => {
      const mesh = decodeNavMesh(writeNavFile({ ...detailedSpec(16), trailer: [1, 2, 3, 4, 5] }));
      expect(mesh.header.trailingBytes).toBe(5);
      expect(mesh.areaCount).toBe(2);
    });

    it('honors a custom per-area data size', () => {
      const spec: NavFileSpec = { ...detailedSpec(16), customAreaDataSize: 0 };
      const mesh = decodeNavMesh(writeNavFile(spec), { customAreaDataSize: 0 });
      expect(mesh.getArea(1).customData).toHaveLength(0);
      expect(mesh.findLadder(7)?.bottomAreaId).toBe(1);
    });

    it('rejects a negative custom data size', () => {
      expect(() => decodeNavMesh(writeNavFile({}), { customAreaDataSize: -1 })).toThrow(RangeError);
    });
  });

  describe('malformed input', () => {
    it('rejects a wrong magic number', () => {
      const err = decodeError(writeNavFile({ magic: 0xdeadbeef }));
      expect(err).toBeInstanceOf(InvalidMagicError);
      if (!(err instanceof InvalidMagicError)) return;
      expect(err.magic).toBe(0xdeadbeef);
      expect(err.offset).toBe(0);
      expect(err.message).toBe('Invalid magic number 0xDEADBEEF, not a nav file or corrupted (at byte 0)');
    });

    it.each([5, 17, 0])('rejects version %i', (version) => {
      const bytes = writeNavFile({ version: 16 });
      new DataView(bytes.buffer).setUint32(4, version, true);
      const err = decodeError(bytes);
      expect(err).toBeInstanceOf(UnsupportedVersionError);
      if (!(err instanceof UnsupportedVersionError)) return;
      expect(err.version).toBe(version);
      expect(err.offset).toBe(4);
    });

    it('reports truncation at every cut point', () => {
      for (const version of [6, 12, 16]) {
        const file = writeNavFile(detailedSpec(version));
        for (let cut = 0; cut < file.length; cut++) {
          const err = decodeError(file.subarray(0, cut));
          if (!(err instanceof UnexpectedEofError)) {
            throw new Error(`version ${version} cut at ${cut}: expected UnexpectedEofError, got ${String(err)}`);
          }
        }
      }
    });

    it('rejects an area count beyond the format bound', () => {
      const bytes = writeNavFile({});
      new DataView(bytes.buffer).setUint32(FIRST_AREA_OFFSET_V16 - 4, 0xffffffff, true);
      const err = decodeError(bytes);
      expect(err).toBeInstanceOf(CorruptCountError);
      if (!(err instanceof CorruptCountError)) return;
      expect(err.count).toBe(0xffffffff);
      expect(err.offset).toBe(FIRST_AREA_OFFSET_V16 - 4);
    });

    it('treats a plausible area count with no records as truncation', () => {
      const bytes = writeNavFile({});
      new DataView(bytes.buffer).setUint32(FIRST_AREA_OFFSET_V16 - 4, 2000, true);
      expect(decodeError(bytes)).toBeInstanceOf(UnexpectedEofError);
    });

    it('rejects a connection list above its bound', () => {
      const ids = Array.from({ length: 5000 }, () => 1);
      const err = decodeError(writeNavFile({ areas: [flatArea(1, 0, 0, 10, 0, { connections: { north: ids } })] }));
      expect(err).toBeInstanceOf(CorruptCountError);
    });

    it('rejects a connection to a missing area', () => {
      const err = decodeError(
        writeNavFile({ areas: [flatArea(1, 0, 0, 10, 0, { connections: { north: [99] } }), flatArea(2, 10, 0, 10, 0)] }),
      );
      expect(err).toBeInstanceOf(DanglingReferenceError);
      if (!(err instanceof DanglingReferenceError)) return;
      expect(err.targetId).toBe(99);
      expect(err.offset).toBe(FIRST_AREA_OFFSET_V16);
      expect(err.message).toBe(`Area 1 north connection references missing id 99 (at byte ${FIRST_AREA_OFFSET_V16})`);
    });

    it('rejects a visible area that does not exist', () => {
      const err = decodeError(writeNavFile({ areas: [flatArea(1, 0, 0, 10, 0, { visibleAreas: [{ areaId: 5, attributes: 0 }] })] }));
      expect(err).toBeInstanceOf(DanglingReferenceError);
    });

    it('rejects a ladder link that does not exist', () => {
      const err = decodeError(writeNavFile({ areas: [flatArea(1, 0, 0, 10, 0, { ladderConnections: { up: [3] } })] }));
      expect(err).toBeInstanceOf(DanglingReferenceError);
      if (!(err instanceof DanglingReferenceError)) return;
      expect(err.field).toBe('up ladder');
    });

    it('rejects a ladder attached to a missing area', () => {
      const err = decodeError(
        writeNavFile({
          areas: [flatArea(1, 0, 0, 10, 0)],
          ladders: [{ id: 1, top: [0, 0, 50], bottom: [0, 0, 0], bottomArea: 8 }],
        }),
      );
      expect(err).toBeInstanceOf(DanglingReferenceError);
      if (!(err instanceof DanglingReferenceError)) return;
      expect(err.owner).toBe('Ladder 1');
    });

    it('rejects a place index past the place table', () => {
      const err = decodeError(writeNavFile({ places: ['Bridge'], areas: [flatArea(1, 0, 0, 10, 0, { placeIndex: 2 })] }));
      expect(err).toBeInstanceOf(DanglingReferenceError);
    });

    it('rejects an area whose extent is infinite', () => {
      const areas = Array.from({ length: 9 }, (_, i) => flatArea(i + 1, i * 10, 0, 10, 5));
      areas.push({ id: 10, northWest: [-Infinity, 500, 0], southEast: [Infinity, 510, 0] });
      const offset = FIRST_AREA_OFFSET_V16 + 9 * minAreaRecordSize(formatFeatures(16), 4);

      const err = decodeError(writeNavFile({ areas }));
      expect(err).toBeInstanceOf(NonFiniteValueError);
      if (!(err instanceof NonFiniteValueError)) return;
      expect(err.value).toBe(-Infinity);
      expect(err.offset).toBe(offset);
      expect(err.message).toBe(`Area 10 corner coordinate is not finite (-Infinity) (at byte ${offset})`);
    });

    it('rejects a NaN corner height ahead of a valid floor', () => {
      const err = decodeError(writeNavFile({ areas: [flatArea(1, 0, 0, 10, NaN), flatArea(2, 0, 0, 10, 7)] }));
      expect(err).toBeInstanceOf(NonFiniteValueError);
      if (!(err instanceof NonFiniteValueError)) return;
      expect(err.value).toBeNaN();
      expect(err.offset).toBe(FIRST_AREA_OFFSET_V16);
    });

    it('rejects duplicate area ids', () => {
      const err = decodeError(writeNavFile({ areas: [flatArea(4, 0, 0, 10, 0), flatArea(4, 10, 0, 10, 0)] }));
      expect(err).toBeInstanceOf(DuplicateIdError);
      if (!(err instanceof DuplicateIdError)) return;
      expect(err.id).toBe(4);
      expect(err.kind).toBe('area');
      expect(err.offset).toBe(FIRST_AREA_OFFSET_V16 + minAreaRecordSize(formatFeatures(16), 4));
    });

    it('rejects duplicate ladder ids', () => {
      const ladder: LadderSpec = { id: 2, top: [0, 0, 10], bottom: [0, 0, 0] };
      const err = decodeError(writeNavFile({ ladders: [ladder, ladder] }));
      expect(err).toBeInstanceOf(DuplicateIdError);
    });
  });
});
