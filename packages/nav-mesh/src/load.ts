import type { ByteSource } from './byte-cursor.js';
import { decodeNavMesh } from './mesh-decoder.js';
import type { DecodeOptions } from './mesh-decoder.js';
import type { NavMesh } from './nav-mesh.js';
import { buildSpatialIndex } from './spatial-index.js';
import type { SpatialIndex, SpatialIndexOptions } from './spatial-index.js';

export type LoadOptions = Partial<DecodeOptions & SpatialIndexOptions>;

/** A decoded mesh and the query tree built over it. */
export interface LoadedNavMesh {
  mesh: NavMesh;
  index: SpatialIndex;
}

/** Decode a .nav buffer and build its spatial index in one step. */
export function loadNavMesh(bytes: ByteSource, options: LoadOptions = {}): LoadedNavMesh {
  const { customAreaDataSize, leafCapacity, maxDepth, rootMargin } = options;
  const mesh = decodeNavMesh(bytes, customAreaDataSize === undefined ? {} : { customAreaDataSize });

  const indexOptions: Partial<SpatialIndexOptions> = {};
  if (leafCapacity !== undefined) indexOptions.leafCapacity = leafCapacity;
  if (maxDepth !== undefined) indexOptions.maxDepth = maxDepth;
  if (rootMargin !== undefined) indexOptions.rootMargin = rootMargin;

  return { mesh, index: buildSpatialIndex(mesh, indexOptions) };
}
