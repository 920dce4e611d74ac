/**
 * Shape constructors and intersection dispatch.
 */

import { AABB } from "../geometry/aabb";
import { buildAcceleration, type BVHConfig } from "../geometry/bvh";
import { HIT_EPSILON, type TriangleMesh } from "../geometry/triangle";
import { ensure } from "../errors";
import { add, isZero, negate, normalize, scale, type Axis, type Vec3 } from "../math/vec3";
import type { TraversalMetrics } from "../metrics";
import { sphereTrace, type SDF, type SphereTraceConfig } from "./sdf";
import type { BoxShape, MeshShape, SDFShape, Shape, ShapeHit } from "./types";

// =============================================================================
// Constructors
// =============================================================================

/** Builds the mesh's BVH once, up front. */
export function meshShape(mesh: TriangleMesh, cfg: BVHConfig = {}): MeshShape {
  return { kind: "mesh", id: mesh.id, mesh, bvh: buildAcceleration(mesh, cfg) };
}

export function boxShape(id: number, width: number, height: number, depth: number): BoxShape {
  ensure(width > 0 && height > 0 && depth > 0, "Box dimensions must be positive");
  const size: Vec3 = [width, height, depth];
  const half = scale(size, 0.5);
  return { kind: "box", id, size, bounds: new AABB(negate(half), half) };
}

export function sdfShape(id: number, sdf: SDF, bounds: AABB, trace: SphereTraceConfig = {}): SDFShape {
  return { kind: "sdf", id, sdf, bounds, trace };
}

// =============================================================================
// Queries
// =============================================================================

export function shapeBounds(shape: Shape): AABB {
  switch (shape.kind) {
    case "mesh":
      return shape.bvh.bounds;
    case "box":
    case "sdf":
      return shape.bounds;
    default: {
      const unreachable: never = shape;
      return unreachable;
    }
  }
}

/**
 * Outward normal of the face on `axis` that a ray along `direction` enters
 * (`exiting` false) or leaves (`exiting` true). Edges and corners take the
 * face of the slab the slab test settled on, so a hit never shades as a face
 * the ray runs parallel to.
 */
function boxFaceNormal(axis: Axis | null, direction: Vec3, exiting: boolean): Vec3 {
  const normal: Vec3 = [0, 0, 0];
  if (axis === null) return normal;
  const d = direction[axis];
  normal[axis] = (d > 0) === exiting ? 1 : -1;
  return normal;
}

function hitAt(origin: Vec3, direction: Vec3, distance: number, normal: Vec3): ShapeHit {
  // Degenerate geometry: face the viewer
  const n = isZero(normal) ? negate(normalize(direction)) : normal;
  return { distance, point: add(origin, scale(direction, distance)), normal: n };
}

/**
 * Nearest hit in the shape's local space. Box and SDF shapes count one box
 * test each in `metrics`; meshes report their full traversal.
 */
export function intersectShape(
  shape: Shape,
  origin: Vec3,
  direction: Vec3,
  metrics?: TraversalMetrics
): ShapeHit | null {
  switch (shape.kind) {
    case "mesh": {
      const hit = shape.bvh.intersectRay(origin, direction, metrics);
      if (hit === null) return null;
      return hitAt(origin, direction, hit.distance, hit.triangle.normal);
    }

    case "box": {
      if (metrics) metrics.boxTests++;
      const slab = shape.bounds.intersectRay(origin, direction);
      if (slab === null) return null;
      // Origin inside the box: the exit face is the visible one
      const exiting = slab.near <= HIT_EPSILON;
      const distance = exiting ? slab.far : slab.near;
      if (distance <= HIT_EPSILON) return null;
      const normal = boxFaceNormal(exiting ? slab.farAxis : slab.nearAxis, direction, exiting);
      return hitAt(origin, direction, distance, normal);
    }

    case "sdf": {
      if (metrics) metrics.boxTests++;
      const slab = shape.bounds.intersectRay(origin, direction);
      if (slab === null) return null;
      const distance = sphereTrace(shape.sdf, origin, direction, slab.near, slab.far, shape.trace);
      if (distance === null) return null;
      const point = add(origin, scale(direction, distance));
      return hitAt(origin, direction, distance, shape.sdf.normalAt(point));
    }

    default: {
      const unreachable: never = shape;
      return unreachable;
    }
  }
}
