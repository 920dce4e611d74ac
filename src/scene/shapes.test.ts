import { describe, test, expect } from "vitest";
import { AABB } from "../geometry/aabb";
import type { Vec3 } from "../math/vec3";
import { emptyMetrics } from "../metrics";
import { cube } from "./models/primitives";
import { SDF, SDFSphere } from "./sdf";
import { boxShape, intersectShape, meshShape, sdfShape, shapeBounds } from "./shapes";

const DOWN: Vec3 = [0, 0, -1];

/** A sphere whose normal query always fails. */
class FlatNormalSphere extends SDF {
  evaluate(p: Vec3): number {
    return Math.hypot(p[0], p[1], p[2]) - 1;
  }

  normalAt(): Vec3 {
    return [0, 0, 0];
  }
}

describe("boxShape", () => {
  test("is centred on its local origin", () => {
    const box = boxShape(1, 4, 2, 2);
    expect(box.bounds.min).toEqual([-2, -1, -1]);
    expect(box.bounds.max).toEqual([2, 1, 1]);
    expect(shapeBounds(box)).toBe(box.bounds);
  });

  test("rejects non-positive dimensions", () => {
    expect(() => boxShape(1, 4, 0, 2)).toThrow("Box dimensions must be positive");
  });

  test("hits the front face", () => {
    const metrics = emptyMetrics();
    const hit = intersectShape(boxShape(1, 4, 2, 2), [0, 0, 5], DOWN, metrics);
    expect(hit?.distance).toBe(4);
    expect(hit?.point).toEqual([0, 0, 1]);
    expect(hit?.normal).toEqual([0, 0, 1]);
    expect(metrics.boxTests).toBe(1);
  });

  test("reports the exit face when the origin is inside", () => {
    const hit = intersectShape(boxShape(1, 4, 2, 2), [0, 0, 0], DOWN);
    expect(hit?.distance).toBe(1);
    expect(hit?.normal).toEqual([0, 0, -1]);
  });

  test("rays along an edge take the face they enter", () => {
    const box = boxShape(1, 4, 2, 2);
    for (const origin of [[2, 1, 5], [-2, -1, 5], [2, -1, 5], [-2, 0, 5]] satisfies Vec3[]) {
      const hit = intersectShape(box, origin, DOWN);
      expect(hit?.distance).toBe(4);
      expect(hit?.normal).toEqual([0, 0, 1]);
    }
  });

  test("side faces point against the ray", () => {
    const box = boxShape(1, 4, 2, 2);
    expect(intersectShape(box, [-3, 0, 0.5], [1, 0, 0])?.normal).toEqual([-1, 0, 0]);
    expect(intersectShape(box, [0, 4, 0], [0, -1, 0])?.normal).toEqual([0, 1, 0]);
    expect(intersectShape(box, [0, 0, 0], [1, 0, 0])?.normal).toEqual([1, 0, 0]);
  });

  test("misses outside the footprint", () => {
    expect(intersectShape(boxShape(1, 4, 2, 2), [5, 0, 5], DOWN)).toBeNull();
  });
});

describe("meshShape", () => {
  test("exposes the BVH bounds", () => {
    const shape = meshShape(cube(2, 2));
    expect(shape.id).toBe(2);
    expect(shapeBounds(shape).min).toEqual([-1, -1, -1]);
    expect(shapeBounds(shape).max).toEqual([1, 1, 1]);
  });

  test("hits the front face with its triangle normal", () => {
    const metrics = emptyMetrics();
    const hit = intersectShape(meshShape(cube(2, 2)), [0.5, -0.25, 5], DOWN, metrics);
    expect(hit?.distance).toBeCloseTo(4, 9);
    expect(hit?.normal).toEqual([0, 0, 1]);
    expect(metrics.triangleHits).toBeGreaterThan(0);
  });

  test("misses beside the mesh", () => {
    expect(intersectShape(meshShape(cube(2, 2)), [3, 0, 5], DOWN)).toBeNull();
  });
});

describe("sdfShape", () => {
  const sphere = sdfShape(3, new SDFSphere(2), new AABB([-2, -2, -2], [2, 2, 2]));

  test("traces from the bounds entry", () => {
    const metrics = emptyMetrics();
    const hit = intersectShape(sphere, [0, 0, 10], DOWN, metrics);
    expect(hit?.distance).toBe(8);
    expect(hit?.normal).toEqual([0, 0, 1]);
    expect(metrics.boxTests).toBe(1);
  });

  test("misses inside the bounds corner", () => {
    expect(intersectShape(sphere, [1.9, 1.9, 10], DOWN)).toBeNull();
  });

  test("misses outside the bounds without tracing", () => {
    expect(intersectShape(sphere, [3, 0, 10], DOWN)).toBeNull();
  });

  test("falls back to facing the viewer when the normal is degenerate", () => {
    const shape = sdfShape(4, new FlatNormalSphere(), new AABB([-1, -1, -1], [1, 1, 1]));
    const hit = intersectShape(shape, [0, 0, 5], DOWN);
    expect(hit?.distance).toBe(4);
    const n = hit?.normal ?? [NaN, NaN, NaN];
    expect(n[0]).toBeCloseTo(0, 12);
    expect(n[1]).toBeCloseTo(0, 12);
    expect(n[2]).toBe(1);
  });
});
