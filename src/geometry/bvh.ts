/**
 * Bounding volume hierarchy over a mesh's triangles.
 *
 * Built top-down with a binned surface area heuristic; queried for the
 * nearest hit with near-child-first traversal.
 */

import { config } from "../config";
import { GeometryError } from "../errors";
import { dot, sub, type Axis, type Vec3 } from "../math/vec3";
import { emptyMetrics, type TraversalMetrics } from "../metrics";
import { AABB, type SlabHit } from "./aabb";
import type { Triangle, TriangleHit, TriangleMesh } from "./triangle";

// =============================================================================
// Types
// =============================================================================

export interface BVHLeaf {
  kind: "leaf";
  bounds: AABB;
  triangles: readonly Triangle[];
  depth: number;
}

export interface BVHInterior {
  kind: "interior";
  bounds: AABB;
  left: BVHNode;
  right: BVHNode;
  depth: number;
}

export type BVHNode = BVHLeaf | BVHInterior;

export interface BVHConfig {
  maxLeafTriangles?: number;
  maxDepth?: number;
  binCount?: number;
  traversalCost?: number;
  intersectionCost?: number;
  /**
   * Let SAH stop splitting when no split beats a single leaf. Off by default,
   * since it can produce leaves larger than `maxLeafTriangles`.
   */
  sahEarlyLeaf?: boolean;
  /** With `sahEarlyLeaf`, only counts up to this multiple of `maxLeafTriangles` may stop early. */
  sahLeafMultiplier?: number;
}

export interface BVHStats {
  totalNodes: number;
  leafNodes: number;
  totalTriangles: number;
  maxDepth: number;
  maxLeafSize: number;
}

type BuildSettings = Required<BVHConfig>;

interface Bin {
  bounds: AABB | null;
  count: number;
}

interface Split {
  bin: number;
  cost: number;
}

// Slack on the far-child test so ties between children are still resolved
// by distance rather than by visiting order.
const PRUNE_SLACK = 1e-9;

// Node boxes are padded by this fraction so rays grazing a face after a
// rotation still reach the triangles the brute-force scan finds.
const BOX_TOLERANCE = 1e-9;

// =============================================================================
// Build
// =============================================================================

function unionBounds(a: AABB | null, b: AABB | null): AABB | null {
  if (a === null) return b;
  if (b === null) return a;
  return a.union(b);
}

function binIndex(value: number, lo: number, extent: number, binCount: number): number {
  const bin = Math.floor(((value - lo) / extent) * binCount);
  return Math.min(binCount - 1, Math.max(0, bin));
}

function findBestSplit(
  triangles: readonly Triangle[],
  bounds: AABB,
  axis: Axis,
  s: BuildSettings
): Split | null {
  const lo = bounds.min[axis];
  const extent = bounds.max[axis] - lo;
  const parentArea = bounds.surfaceArea;
  if (extent <= 0 || parentArea <= 0) return null;

  const bins: Bin[] = Array.from({ length: s.binCount }, () => ({ bounds: null, count: 0 }));
  for (const t of triangles) {
    const bin = bins[binIndex(t.centroid[axis], lo, extent, s.binCount)]!;
    bin.bounds = unionBounds(bin.bounds, t.bounds);
    bin.count++;
  }

  // Prefix sweep: everything in bins [0..i]
  const prefix: Bin[] = [];
  let running: Bin = { bounds: null, count: 0 };
  for (const bin of bins) {
    running = { bounds: unionBounds(running.bounds, bin.bounds), count: running.count + bin.count };
    prefix.push(running);
  }

  // Suffix sweep, evaluating the split after bin i
  let best: Split | null = null;
  running = { bounds: null, count: 0 };
  for (let i = s.binCount - 2; i >= 0; i--) {
    const right = bins[i + 1]!;
    running = { bounds: unionBounds(running.bounds, right.bounds), count: running.count + right.count };
    const left = prefix[i]!;
    if (left.count === 0 || running.count === 0 || !left.bounds || !running.bounds) continue;

    const cost =
      s.traversalCost +
      s.intersectionCost *
        ((left.bounds.surfaceArea / parentArea) * left.count +
          (running.bounds.surfaceArea / parentArea) * running.count);

    if (best === null || cost < best.cost) {
      best = { bin: i, cost };
    }
  }

  return best;
}

function medianSplit(triangles: readonly Triangle[], axis: Axis): [Triangle[], Triangle[]] {
  const sorted = [...triangles].sort((a, b) => a.centroid[axis] - b.centroid[axis]);
  const mid = Math.floor(sorted.length / 2);
  return [sorted.slice(0, mid), sorted.slice(mid)];
}

function buildNode(triangles: readonly Triangle[], depth: number, s: BuildSettings): BVHNode {
  const bounds = AABB.fromTriangles(triangles);

  if (triangles.length <= s.maxLeafTriangles || depth >= s.maxDepth) {
    return { kind: "leaf", bounds, triangles, depth };
  }

  const axis = bounds.longestAxis;
  const split = findBestSplit(triangles, bounds, axis, s);

  let left: Triangle[];
  let right: Triangle[];

  if (split === null) {
    [left, right] = medianSplit(triangles, axis);
  } else {
    const leafCost = triangles.length * s.intersectionCost;
    if (
      s.sahEarlyLeaf &&
      split.cost >= leafCost &&
      triangles.length <= s.maxLeafTriangles * s.sahLeafMultiplier
    ) {
      return { kind: "leaf", bounds, triangles, depth };
    }

    const lo = bounds.min[axis];
    const extent = bounds.max[axis] - lo;
    left = [];
    right = [];
    for (const t of triangles) {
      if (binIndex(t.centroid[axis], lo, extent, s.binCount) <= split.bin) {
        left.push(t);
      } else {
        right.push(t);
      }
    }

    if (left.length === 0 || right.length === 0) {
      [left, right] = medianSplit(triangles, axis);
    }
  }

  return {
    kind: "interior",
    bounds,
    left: buildNode(left, depth + 1, s),
    right: buildNode(right, depth + 1, s),
    depth,
  };
}

// =============================================================================
// Traversal
// =============================================================================

function visit(node: BVHNode, origin: Vec3, direction: Vec3, m: TraversalMetrics): TriangleHit | null {
  m.nodesVisited++;
  m.maxDepth = Math.max(m.maxDepth, node.depth);

  switch (node.kind) {
    case "leaf": {
      let closest: TriangleHit | null = null;
      for (const triangle of node.triangles) {
        m.triangleTests++;
        const distance = triangle.intersect(origin, direction);
        if (distance === null) continue;
        m.triangleHits++;
        if (closest === null || distance < closest.distance) {
          closest = { distance, triangle };
        }
      }
      return closest;
    }

    case "interior": {
      m.boxTests += 2;
      const leftSlab = node.left.bounds.intersectRay(origin, direction, BOX_TOLERANCE);
      const rightSlab = node.right.bounds.intersectRay(origin, direction, BOX_TOLERANCE);

      const candidates: { node: BVHNode; slab: SlabHit; order: number }[] = [];
      if (leftSlab) {
        candidates.push({ node: node.left, slab: leftSlab, order: dot(sub(node.left.bounds.center, origin), direction) });
      }
      if (rightSlab) {
        candidates.push({ node: node.right, slab: rightSlab, order: dot(sub(node.right.bounds.center, origin), direction) });
      }
      candidates.sort((a, b) => a.order - b.order);

      let closest: TriangleHit | null = null;
      for (const c of candidates) {
        if (closest !== null && closest.distance + PRUNE_SLACK < c.slab.near) continue;
        const hit = visit(c.node, origin, direction, m);
        if (hit !== null && (closest === null || hit.distance < closest.distance)) {
          closest = hit;
        }
      }
      return closest;
    }

    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

// =============================================================================
// BVH
// =============================================================================

export class BVH {
  private constructor(
    readonly root: BVHNode,
    readonly settings: Readonly<BuildSettings>
  ) {}

  static build(triangles: readonly Triangle[], cfg: BVHConfig = {}): BVH {
    if (triangles.length === 0) {
      throw new GeometryError("Cannot build a BVH from an empty triangle list");
    }

    const settings: BuildSettings = {
      maxLeafTriangles: cfg.maxLeafTriangles ?? config.bvh.maxLeafTriangles,
      maxDepth: cfg.maxDepth ?? config.bvh.maxDepth,
      binCount: cfg.binCount ?? config.bvh.binCount,
      traversalCost: cfg.traversalCost ?? config.bvh.traversalCost,
      intersectionCost: cfg.intersectionCost ?? config.bvh.intersectionCost,
      sahLeafMultiplier: cfg.sahLeafMultiplier ?? config.bvh.sahLeafMultiplier,
      sahEarlyLeaf: cfg.sahEarlyLeaf ?? config.bvh.sahEarlyLeaf,
    };

    if (!Number.isInteger(settings.maxLeafTriangles) || settings.maxLeafTriangles < 1) {
      throw new GeometryError("maxLeafTriangles must be a positive integer");
    }
    if (!Number.isInteger(settings.binCount) || settings.binCount < 2) {
      throw new GeometryError("binCount must be an integer of at least 2");
    }
    if (settings.maxDepth < 0) {
      throw new GeometryError("maxDepth must not be negative");
    }

    return new BVH(buildNode(triangles, 0, settings), settings);
  }

  get bounds(): AABB {
    return this.root.bounds;
  }

  /**
   * Nearest hit along the ray. Pass `metrics` to accumulate counters; the
   * object is only ever incremented, so separate callers should pass separate
   * instances and merge them with `combineMetrics`.
   */
  intersectRay(
    origin: Vec3,
    direction: Vec3,
    metrics: TraversalMetrics = emptyMetrics()
  ): TriangleHit | null {
    metrics.boxTests++;
    if (!this.root.bounds.intersectRay(origin, direction, BOX_TOLERANCE)) return null;
    return visit(this.root, origin, direction, metrics);
  }

  leaves(): BVHLeaf[] {
    const out: BVHLeaf[] = [];
    const stack: BVHNode[] = [this.root];
    while (stack.length > 0) {
      const node = stack.pop()!;
      if (node.kind === "leaf") {
        out.push(node);
      } else {
        stack.push(node.right, node.left);
      }
    }
    return out;
  }

  stats(): BVHStats {
    return collectStats(this.root);
  }
}

function collectStats(node: BVHNode): BVHStats {
  if (node.kind === "leaf") {
    return {
      totalNodes: 1,
      leafNodes: 1,
      totalTriangles: node.triangles.length,
      maxDepth: node.depth,
      maxLeafSize: node.triangles.length,
    };
  }

  const l = collectStats(node.left);
  const r = collectStats(node.right);
  return {
    totalNodes: 1 + l.totalNodes + r.totalNodes,
    leafNodes: l.leafNodes + r.leafNodes,
    totalTriangles: l.totalTriangles + r.totalTriangles,
    maxDepth: Math.max(l.maxDepth, r.maxDepth),
    maxLeafSize: Math.max(l.maxLeafSize, r.maxLeafSize),
  };
}

export function buildAcceleration(mesh: TriangleMesh, cfg: BVHConfig = {}): BVH {
  return BVH.build(mesh.triangles, cfg);
}
