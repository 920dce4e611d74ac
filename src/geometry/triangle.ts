/**
 * Triangle primitive and immutable triangle meshes.
 */

import { ensure } from "../errors";
import { add, cross, dot, length, normalize, scale, sub, type Vec3 } from "../math/vec3";
import { AABB } from "./aabb";

/** Rays closer to parallel than this never hit. */
export const PARALLEL_EPSILON = 1e-10;
/** Hits at or behind this distance are treated as self-intersections. */
export const HIT_EPSILON = 1e-10;

export interface TriangleHit {
  distance: number;
  triangle: Triangle;
}

// =============================================================================
// Triangle
// =============================================================================

export class Triangle {
  private cachedNormal: Vec3 | null = null;
  private cachedCentroid: Vec3 | null = null;
  private cachedBounds: AABB | null = null;

  readonly v0: Vec3;
  readonly v1: Vec3;
  readonly v2: Vec3;

  /** Vertices are copied, so the cached normal and bounds stay in sync. */
  constructor(v0: Vec3, v1: Vec3, v2: Vec3) {
    this.v0 = [v0[0], v0[1], v0[2]];
    this.v1 = [v1[0], v1[1], v1[2]];
    this.v2 = [v2[0], v2[1], v2[2]];
  }

  /** Unit normal by the right-hand rule, or the zero vector when degenerate. */
  get normal(): Vec3 {
    if (this.cachedNormal === null) {
      this.cachedNormal = normalize(cross(sub(this.v1, this.v0), sub(this.v2, this.v0)));
    }
    return this.cachedNormal;
  }

  get centroid(): Vec3 {
    if (this.cachedCentroid === null) {
      this.cachedCentroid = scale(add(add(this.v0, this.v1), this.v2), 1 / 3);
    }
    return this.cachedCentroid;
  }

  get area(): number {
    return length(cross(sub(this.v1, this.v0), sub(this.v2, this.v0))) / 2;
  }

  get bounds(): AABB {
    if (this.cachedBounds === null) {
      this.cachedBounds = AABB.fromTriangle(this);
    }
    return this.cachedBounds;
  }

  /** Möller–Trumbore. Returns the forward hit distance or null. */
  intersect(origin: Vec3, direction: Vec3): number | null {
    const edge1 = sub(this.v1, this.v0);
    const edge2 = sub(this.v2, this.v0);
    const h = cross(direction, edge2);
    const det = dot(edge1, h);

    if (Math.abs(det) < PARALLEL_EPSILON) return null;

    const f = 1 / det;
    const s = sub(origin, this.v0);
    const u = f * dot(s, h);
    if (u < 0 || u > 1) return null;

    const q = cross(s, edge1);
    const v = f * dot(direction, q);
    if (v < 0 || u + v > 1) return null;

    const t = f * dot(edge2, q);
    return t > HIT_EPSILON ? t : null;
  }

  map(fn: (v: Vec3) => Vec3): Triangle {
    return new Triangle(fn(this.v0), fn(this.v1), fn(this.v2));
  }
}

// =============================================================================
// Triangle Mesh
// =============================================================================

export class TriangleMesh {
  readonly triangles: readonly Triangle[];
  private cachedBounds: AABB | null = null;

  constructor(
    readonly id: number,
    triangles: readonly Triangle[]
  ) {
    ensure(triangles.length > 0, "Triangle mesh needs at least one triangle");
    this.triangles = Object.freeze([...triangles]);
  }

  get bounds(): AABB {
    if (this.cachedBounds === null) {
      this.cachedBounds = AABB.fromTriangles(this.triangles);
    }
    return this.cachedBounds;
  }

  scaled(factor: number): TriangleMesh {
    ensure(factor > 0, "Scale factor must be positive");
    return new TriangleMesh(this.id, this.triangles.map((t) => t.map((v) => scale(v, factor))));
  }

  translated(offset: Vec3): TriangleMesh {
    return new TriangleMesh(this.id, this.triangles.map((t) => t.map((v) => add(v, offset))));
  }

  /** Centers the mesh on the origin and scales its largest extent to `targetSize`. */
  fitToSize(targetSize: number): TriangleMesh {
    ensure(targetSize > 0, "Target size must be positive");
    const box = this.bounds;
    const [dx, dy, dz] = box.size;
    const extent = Math.max(dx, dy, dz);
    const factor = extent > 0 ? targetSize / extent : 1;
    const center = box.center;
    return new TriangleMesh(
      this.id,
      this.triangles.map((t) => t.map((v) => scale(sub(v, center), factor)))
    );
  }

  /** Linear scan over every triangle; the first of equally near hits wins. */
  intersectRay(origin: Vec3, direction: Vec3): TriangleHit | null {
    let closest: TriangleHit | null = null;
    for (const triangle of this.triangles) {
      const distance = triangle.intersect(origin, direction);
      if (distance !== null && (closest === null || distance < closest.distance)) {
        closest = { distance, triangle };
      }
    }
    return closest;
  }
}
