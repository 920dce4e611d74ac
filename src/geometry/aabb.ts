/**
 * Axis-aligned bounding boxes.
 */

import { GeometryError } from "../errors";
import type { RotationMatrix } from "../math/rotation";
import { add, AXES, max3, min3, scale, sub, type Axis, type Vec3 } from "../math/vec3";

export interface SlabHit {
  /** Parametric entry distance, clamped to 0 when the origin is inside. */
  near: number;
  far: number;
  /** Axis of the slab entered last, or null when the ray is parallel to every slab. */
  nearAxis: Axis | null;
  /** Axis of the slab left first. */
  farAxis: Axis | null;
}

export class AABB {
  constructor(
    readonly min: Vec3,
    readonly max: Vec3
  ) {}

  static fromPoints(points: readonly Vec3[]): AABB {
    const first = points[0];
    if (!first) {
      throw new GeometryError("Cannot create bounding box from no points");
    }
    let min: Vec3 = first;
    let max: Vec3 = first;
    for (const p of points) {
      min = min3(min, p);
      max = max3(max, p);
    }
    return new AABB(min, max);
  }

  static fromTriangle(t: { v0: Vec3; v1: Vec3; v2: Vec3 }): AABB {
    return new AABB(min3(min3(t.v0, t.v1), t.v2), max3(max3(t.v0, t.v1), t.v2));
  }

  static fromTriangles(triangles: readonly { bounds: AABB }[]): AABB {
    const first = triangles[0];
    if (!first) {
      throw new GeometryError("Cannot create bounding box from empty triangle sequence");
    }
    let box = first.bounds;
    for (let i = 1; i < triangles.length; i++) {
      box = box.union(triangles[i]!.bounds);
    }
    return box;
  }

  get center(): Vec3 {
    return scale(add(this.min, this.max), 0.5);
  }

  get size(): Vec3 {
    return sub(this.max, this.min);
  }

  get surfaceArea(): number {
    const [dx, dy, dz] = this.size;
    return 2 * (dx * dy + dy * dz + dz * dx);
  }

  /** Axis of greatest extent; ties go to the lower axis. */
  get longestAxis(): Axis {
    const [dx, dy, dz] = this.size;
    if (dx >= dy && dx >= dz) return 0;
    if (dy >= dz) return 1;
    return 2;
  }

  union(other: AABB): AABB {
    return new AABB(min3(this.min, other.min), max3(this.max, other.max));
  }

  contains(p: Vec3): boolean {
    return (
      p[0] >= this.min[0] && p[0] <= this.max[0] &&
      p[1] >= this.min[1] && p[1] <= this.max[1] &&
      p[2] >= this.min[2] && p[2] <= this.max[2]
    );
  }

  overlaps(other: AABB): boolean {
    return (
      this.min[0] <= other.max[0] && this.max[0] >= other.min[0] &&
      this.min[1] <= other.max[1] && this.max[1] >= other.min[1] &&
      this.min[2] <= other.max[2] && this.max[2] >= other.min[2]
    );
  }

  corners(): Vec3[] {
    const { min, max } = this;
    return [
      [min[0], min[1], min[2]],
      [max[0], min[1], min[2]],
      [max[0], max[1], min[2]],
      [min[0], max[1], min[2]],
      [min[0], min[1], max[2]],
      [max[0], min[1], max[2]],
      [max[0], max[1], max[2]],
      [min[0], max[1], max[2]],
    ];
  }

  /** World-space box enclosing this box after `rotation` and `offset`. */
  transformed(rotation: RotationMatrix, offset: Vec3): AABB {
    return AABB.fromPoints(this.corners().map((c) => add(rotation.applyTo(c), offset)));
  }

  /**
   * Slab test. A zero direction component means the ray never crosses that
   * slab, so the origin has to lie inside it; this keeps flat boxes hittable
   * along their thin axis.
   *
   * `tolerance` grows each slab by that fraction of its coordinates (at least
   * one unit), so rays that graze a face still hit after rounding.
   */
  intersectRay(origin: Vec3, direction: Vec3, tolerance: number = 0): SlabHit | null {
    let tmin = -Infinity;
    let tmax = Infinity;
    let nearAxis: Axis | null = null;
    let farAxis: Axis | null = null;

    for (const axis of AXES) {
      const o = origin[axis];
      const d = direction[axis];
      const pad = tolerance * Math.max(1, Math.abs(this.min[axis]), Math.abs(this.max[axis]));
      const lo = this.min[axis] - pad;
      const hi = this.max[axis] + pad;

      if (d === 0) {
        if (o < lo || o > hi) return null;
        continue;
      }

      const invD = 1 / d;
      let t0 = (lo - o) * invD;
      let t1 = (hi - o) * invD;
      if (invD < 0) {
        const tmp = t0;
        t0 = t1;
        t1 = tmp;
      }

      if (t0 > tmin) {
        tmin = t0;
        nearAxis = axis;
      }
      if (t1 < tmax) {
        tmax = t1;
        farAxis = axis;
      }
      if (tmax < tmin) return null;
    }

    if (tmax < 0) return null;
    return { near: Math.max(tmin, 0), far: tmax, nearAxis, farAxis };
  }
}
