/**
 * Version gating for the .nav layout.
 *
 * Every optional or resized field is decided here so the decoder branches on
 * one table rather than on scattered version comparisons.
 */

/** Expected 4-byte magic at the start of every .nav file. */
export const NAV_MAGIC = 0xfeedface;

export const MIN_NAV_VERSION = 6;
export const MAX_NAV_VERSION = 16;

/** Upper bounds for count prefixes. */
export const NAV_LIMITS = {
  areas: 1 << 20,
  connectionsPerDirection: 4096,
  encounterPaths: 1 << 16,
  visibleAreas: 1 << 20,
  ladders: 1 << 16,
  ladderConnectionsPerDirection: 4096,
} as const;

/** Which optional fields a given version carries. */
export interface NavFormatFeatures {
  readonly version: number;
  readonly hasSubVersion: boolean;
  readonly hasAnalyzedFlag: boolean;
  readonly hasUnnamedAreasFlag: boolean;
  /** Width in bytes of the per-area attribute flags. */
  readonly attributeFlagsSize: 1 | 2 | 4;
  readonly hasApproachAreas: boolean;
  readonly hasLightIntensity: boolean;
  readonly hasVisibility: boolean;
  readonly hasLadderDanglingFlag: boolean;
}

export function isSupportedVersion(version: number): boolean {
  return Number.isInteger(version) && version >= MIN_NAV_VERSION && version <= MAX_NAV_VERSION;
}

/**
 * Feature table for a supported version. Callers must check
 * isSupportedVersion first; unknown versions have no layout.
 */
export function formatFeatures(version: number): NavFormatFeatures {
  if (!isSupportedVersion(version)) {
    throw new RangeError(`No nav layout for version ${version}`);
  }
  return {
    version,
    hasSubVersion: version >= 10,
    hasAnalyzedFlag: version >= 14,
    hasUnnamedAreasFlag: version >= 12,
    attributeFlagsSize: version <= 8 ? 1 : version <= 12 ? 2 : 4,
    hasApproachAreas: version < 15,
    hasLightIntensity: version >= 11,
    hasVisibility: version >= 16,
    hasLadderDanglingFlag: version === 6,
  };
}

/**
 * Smallest possible encoded area for a version: every fixed field plus
 * empty count-prefixed lists. Used to reject area counts the buffer cannot
 * hold before allocating for them.
 */
export function minAreaRecordSize(features: NavFormatFeatures, customAreaDataSize: number): number {
  let size = 4; // id
  size += features.attributeFlagsSize;
  size += 12 + 12 + 4 + 4; // corners + two corner heights
  size += 4 * 4; // connection counts
  size += 1; // hiding spot count
  if (features.hasApproachAreas) size += 1;
  size += 4; // encounter path count
  size += 2; // place
  size += 2 * 4; // ladder connection counts
  size += 2 * 4; // earliest occupy times
  if (features.hasLightIntensity) size += 4 * 4;
  if (features.hasVisibility) size += 4 + 4;
  return size + customAreaDataSize;
}

/** Encoded ladder record size for a version. */
export function ladderRecordSize(features: NavFormatFeatures): number {
  // id, width, top, bottom, length, direction, five area ids
  return 4 + 4 + 12 + 12 + 4 + 4 + (features.hasLadderDanglingFlag ? 1 : 0) + 5 * 4;
}
