/**
 * Sum-only traversal counters. Each worker (or row band) fills its own
 * instance; totals are produced with `combineMetrics` afterwards.
 */

export interface TraversalMetrics {
  nodesVisited: number;
  boxTests: number;
  triangleTests: number;
  triangleHits: number;
  maxDepth: number;
}

export interface RenderMetrics {
  rays: number;
  cellsFilled: number;
  placementsRendered: number;
  placementsSkipped: number;
  traversal: TraversalMetrics;
  elapsedMs: number;
}

export function emptyMetrics(): TraversalMetrics {
  return {
    nodesVisited: 0,
    boxTests: 0,
    triangleTests: 0,
    triangleHits: 0,
    maxDepth: 0,
  };
}

export function combineMetrics(a: TraversalMetrics, b: TraversalMetrics): TraversalMetrics {
  return {
    nodesVisited: a.nodesVisited + b.nodesVisited,
    boxTests: a.boxTests + b.boxTests,
    triangleTests: a.triangleTests + b.triangleTests,
    triangleHits: a.triangleHits + b.triangleHits,
    maxDepth: Math.max(a.maxDepth, b.maxDepth),
  };
}

function rate(part: number, whole: number): string {
  return whole > 0 ? `${((part / whole) * 100).toFixed(1)}%` : "N/A";
}

export function formatMetrics(m: TraversalMetrics): string {
  return [
    "BVH Traversal Metrics:",
    `  Nodes Visited: ${m.nodesVisited}`,
    `  Box Tests: ${m.boxTests}`,
    `  Triangle Tests: ${m.triangleTests}`,
    `  Triangle Hits: ${m.triangleHits}`,
    `  Max Depth: ${m.maxDepth}`,
    `  Box Test Hit Rate: ${rate(m.nodesVisited, m.boxTests)}`,
    `  Triangle Hit Rate: ${rate(m.triangleHits, m.triangleTests)}`,
  ].join("\n");
}

export function formatRenderMetrics(m: RenderMetrics): string {
  return [
    `Render: ${m.rays} rays, ${m.cellsFilled} cells filled in ${m.elapsedMs.toFixed(1)}ms`,
    `  Placements: ${m.placementsRendered} rendered, ${m.placementsSkipped} skipped`,
    formatMetrics(m.traversal),
  ].join("\n");
}
