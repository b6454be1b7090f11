export * from './types.js';
export * from './errors.js';
export { ByteCursor } from './byte-cursor.js';
export type { ByteSource, CountWidth } from './byte-cursor.js';
export {
  NAV_MAGIC,
  MIN_NAV_VERSION,
  MAX_NAV_VERSION,
  NAV_LIMITS,
  formatFeatures,
  isSupportedVersion,
} from './format.js';
export type { NavFormatFeatures } from './format.js';
export { NavArea, MIN_AREA_CORNERS, assertFiniteCoordinates } from './nav-area.js';
export type { NavAreaInit } from './nav-area.js';
export { NavMesh } from './nav-mesh.js';
export type { NavMeshParts } from './nav-mesh.js';
export { decodeNavMesh, DEFAULT_DECODE_OPTIONS } from './mesh-decoder.js';
export type { DecodeOptions } from './mesh-decoder.js';
export { SpatialIndex, buildSpatialIndex, DEFAULT_SPATIAL_INDEX_OPTIONS } from './spatial-index.js';
export type { SpatialIndexOptions, SpatialIndexStats, SpatialIndexLeaf } from './spatial-index.js';
export { loadNavMesh } from './load.js';
export type { LoadOptions, LoadedNavMesh } from './load.js';
