/**
 * Quad-tree over area footprints, plus the point queries built on it.
 *
 * The tree is built once from a NavMesh and never changes. An area is
 * stored in every leaf its bounds touch, so a point lookup only has to walk
 * the leaves whose region holds the point.
 */

import { Bounds2 } from '@navkit/core';
import { EDGE_TOLERANCE } from './area-geometry.js';
import type { NavArea } from './nav-area.js';
import type { NavMesh } from './nav-mesh.js';

/** Tree shape settings. */
export interface SpatialIndexOptions {
  /** Areas a node may hold before it is split into quadrants. */
  leafCapacity: number;
  /** Depth at which splitting stops regardless of occupancy. */
  maxDepth: number;
  /** Units the root region extends past the mesh on every side. */
  rootMargin: number;
}

export const DEFAULT_SPATIAL_INDEX_OPTIONS: Readonly<SpatialIndexOptions> = {
  leafCapacity: 8,
  maxDepth: 10,
  rootMargin: 1,
};

/** An area with its file-order position and its footprint box as filed. */
interface IndexedArea {
  readonly area: NavArea;
  readonly order: number;
  /** Area bounds grown by the containment tolerance. */
  readonly footprint: Bounds2;
}

interface QuadLeaf {
  readonly kind: 'leaf';
  readonly region: Bounds2;
  readonly depth: number;
  readonly entries: readonly IndexedArea[];
}

interface QuadBranch {
  readonly kind: 'branch';
  readonly region: Bounds2;
  readonly depth: number;
  readonly children: readonly [QuadNode, QuadNode, QuadNode, QuadNode];
}

type QuadNode = QuadLeaf | QuadBranch;

/** Shape summary of a built tree. */
export interface SpatialIndexStats {
  areas: number;
  nodes: number;
  leaves: number;
  /** Deepest leaf depth reached (root = 0). */
  depth: number;
  /** Area entries across all leaves; above `areas` when areas straddle splits. */
  references: number;
}

/** A leaf's region and the areas filed under it. */
export interface SpatialIndexLeaf {
  region: Bounds2;
  areas: NavArea[];
}

export class SpatialIndex {
  readonly options: Readonly<SpatialIndexOptions>;
  /** Undefined for a mesh without areas. */
  private readonly root: QuadNode | undefined;

  constructor(
    readonly mesh: NavMesh,
    options: Partial<SpatialIndexOptions> = {},
  ) {
    this.options = Object.freeze({ ...DEFAULT_SPATIAL_INDEX_OPTIONS, ...options });
    validateOptions(this.options);

    const meshBounds = mesh.bounds();
    if (!meshBounds) {
      this.root = undefined;
    } else {
      const entries = mesh.areas.map(
        (area, order): IndexedArea => ({ area, order, footprint: area.bounds.expand(EDGE_TOLERANCE) }),
      );
      const margin = Math.max(this.options.rootMargin, EDGE_TOLERANCE);
      this.root = this.buildNode(meshBounds.expand(margin), entries, 0);
    }
    Object.freeze(this);
  }

  /** Region covered by the tree. */
  get bounds(): Bounds2 | undefined {
    return this.root?.region;
  }

  /* ------------------------------------------------------------------ */
  /*  Point queries                                                      */
  /* ------------------------------------------------------------------ */

  /**
   * Areas whose footprint polygon contains (x, y), edges included, in file
   * order.
   */
  query(x: number, y: number): NavArea[] {
    return this.containing(x, y).map((entry) => entry.area);
  }

  /** Surface height of every area containing (x, y), in file order. */
  findZHeights(x: number, y: number): number[] {
    return this.containing(x, y).map((entry) => entry.area.heightAt(x, y));
  }

  /**
   * Height at (x, y) on the containing area whose surface is closest to
   * `zHint`. Overlapping floors (a bridge over a road) are told apart this
   * way; equally close surfaces keep the earlier area in file order.
   *
   * Returns undefined when no area contains the point.
   */
  findBestHeight(x: number, y: number, zHint: number): number | undefined {
    return this.findBestArea(x, y, zHint)?.z;
  }

  /** Like findBestHeight, but returns the chosen area with its height. */
  findBestArea(x: number, y: number, zHint: number): { area: NavArea; z: number } | undefined {
    let best: { area: NavArea; z: number } | undefined;
    let bestDistance = Infinity;
    for (const { area } of this.containing(x, y)) {
      const z = area.heightAt(x, y);
      const distance = Math.abs(z - zHint);
      if (best === undefined || distance < bestDistance) {
        best = { area, z };
        bestDistance = distance;
      }
    }
    return best;
  }

  /* ------------------------------------------------------------------ */
  /*  Region queries and iteration                                       */
  /* ------------------------------------------------------------------ */

  /** Areas whose bounds intersect `bounds`, in file order. */
  areasInBounds(bounds: Bounds2): NavArea[] {
    const found = new Map<number, IndexedArea>();
    const visit = (node: QuadNode): void => {
      if (!node.region.intersects(bounds)) return;
      if (node.kind === 'branch') {
        for (const child of node.children) visit(child);
        return;
      }
      for (const entry of node.entries) {
        if (entry.area.bounds.intersects(bounds)) found.set(entry.area.id, entry);
      }
    };
    if (this.root) visit(this.root);
    return sortByOrder(found).map((entry) => entry.area);
  }

  /** All indexed areas, in file order. */
  areas(): readonly NavArea[] {
    return this.mesh.areas;
  }

  /** Every leaf with its region, depth-first. */
  *leaves(): Generator<SpatialIndexLeaf> {
    const stack: QuadNode[] = this.root ? [this.root] : [];
    let node = stack.pop();
    while (node) {
      if (node.kind === 'leaf') {
        yield { region: node.region, areas: node.entries.map((entry) => entry.area) };
      } else {
        stack.push(...node.children);
      }
      node = stack.pop();
    }
  }

  stats(): SpatialIndexStats {
    const stats: SpatialIndexStats = {
      areas: this.mesh.areaCount,
      nodes: 0,
      leaves: 0,
      depth: 0,
      references: 0,
    };
    const visit = (node: QuadNode): void => {
      stats.nodes++;
      if (node.kind === 'branch') {
        for (const child of node.children) visit(child);
        return;
      }
      stats.leaves++;
      stats.references += node.entries.length;
      stats.depth = Math.max(stats.depth, node.depth);
    };
    if (this.root) visit(this.root);
    return stats;
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                          */
  /* ------------------------------------------------------------------ */

  private containing(x: number, y: number): IndexedArea[] {
    const candidates = new Map<number, IndexedArea>();
    const visit = (node: QuadNode): void => {
      if (node.kind === 'leaf') {
        for (const entry of node.entries) candidates.set(entry.area.id, entry);
        return;
      }
      // Points on a split line fall in every child that touches it.
      for (const child of node.children) {
        if (child.region.containsPoint(x, y)) visit(child);
      }
    };
    if (this.root?.region.containsPoint(x, y)) visit(this.root);

    const hits = new Map<number, IndexedArea>();
    for (const [id, entry] of candidates) {
      if (entry.area.containsPoint(x, y)) hits.set(id, entry);
    }
    return sortByOrder(hits);
  }

  private buildNode(region: Bounds2, entries: readonly IndexedArea[], depth: number): QuadNode {
    if (entries.length <= this.options.leafCapacity || depth >= this.options.maxDepth) {
      return { kind: 'leaf', region, depth, entries };
    }

    const quadrants = region.quadrants();
    const split = quadrants.map((quadrant) =>
      entries.filter((entry) => entry.footprint.intersects(quadrant)),
    );

    // Footprints that all share the split point land in every quadrant;
    // splitting again would only copy them.
    if (split.every((subset) => subset.length === entries.length)) {
      return { kind: 'leaf', region, depth, entries };
    }

    const child = (i: 0 | 1 | 2 | 3): QuadNode => this.buildNode(quadrants[i], split[i] ?? [], depth + 1);
    return {
      kind: 'branch',
      region,
      depth,
      children: [child(0), child(1), child(2), child(3)],
    };
  }
}

/** Build the quad-tree for a decoded mesh. */
export function buildSpatialIndex(mesh: NavMesh, options: Partial<SpatialIndexOptions> = {}): SpatialIndex {
  return new SpatialIndex(mesh, options);
}

function sortByOrder(entries: ReadonlyMap<number, IndexedArea>): IndexedArea[] {
  return [...entries.values()].sort((a, b) => a.order - b.order);
}

function validateOptions(options: Readonly<SpatialIndexOptions>): void {
  if (!Number.isInteger(options.leafCapacity) || options.leafCapacity < 1) {
    throw new RangeError(`leafCapacity must be a positive integer, got ${options.leafCapacity}`);
  }
  if (!Number.isInteger(options.maxDepth) || options.maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${options.maxDepth}`);
  }
  if (!(options.rootMargin >= 0)) {
    throw new RangeError(`rootMargin must be non-negative, got ${options.rootMargin}`);
  }
}
