/**
 * Shared types for scene system.
 */

import type { AABB } from "../geometry/aabb";
import type { BVH } from "../geometry/bvh";
import type { TriangleMesh } from "../geometry/triangle";
import type { Rotation } from "../math/rotation";
import type { Vec3 } from "../math/vec3";
import type { SDF, SphereTraceConfig } from "./sdf";

// =============================================================================
// Shape Types
// =============================================================================

export interface MeshShape {
  kind: "mesh";
  id: number;
  mesh: TriangleMesh;
  bvh: BVH;
}

/** Axis-aligned box centered on the local origin. */
export interface BoxShape {
  kind: "box";
  id: number;
  size: Vec3;
  bounds: AABB;
}

export interface SDFShape {
  kind: "sdf";
  id: number;
  sdf: SDF;
  bounds: AABB;
  trace: SphereTraceConfig;
}

export type Shape = MeshShape | BoxShape | SDFShape;

export type ShapeKind = Shape["kind"];

// =============================================================================
// Scene Data Types
// =============================================================================

/** A shape positioned in the world. Replaced wholesale on every change. */
export interface Placement {
  readonly origin: Vec3;
  readonly rotation: Rotation;
  readonly shape: Shape;
}

/** Local-space intersection. */
export interface ShapeHit {
  distance: number;
  point: Vec3;
  normal: Vec3;
}

/** World extent to render; a `Viewport` satisfies this too. */
export interface Frame {
  origin?: Vec3;
  width: number;
  height: number;
  depth: number;
}
