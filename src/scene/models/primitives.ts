/**
 * Closed triangle meshes for common solids, centered on the origin with
 * counter-clockwise winding seen from outside.
 */

import { ensure } from "../../errors";
import { Triangle, TriangleMesh } from "../../geometry/triangle";
import type { Vec3 } from "../../math/vec3";

function meshFromFaces(id: number, vertices: Vec3[], faces: [number, number, number][]): TriangleMesh {
  return new TriangleMesh(
    id,
    faces.map(([a, b, c]) => new Triangle(vertices[a]!, vertices[b]!, vertices[c]!))
  );
}

/** 12 triangles, two per face. */
export function cube(id: number, size: number): TriangleMesh {
  ensure(size > 0, "Cube size must be positive");
  const h = size / 2;

  const vertices: Vec3[] = [
    [-h, -h, -h], // 0: left-bottom-back
    [h, -h, -h],  // 1: right-bottom-back
    [h, h, -h],   // 2: right-top-back
    [-h, h, -h],  // 3: left-top-back
    [-h, -h, h],  // 4: left-bottom-front
    [h, -h, h],   // 5: right-bottom-front
    [h, h, h],    // 6: right-top-front
    [-h, h, h],   // 7: left-top-front
  ];

  return meshFromFaces(id, vertices, [
    // Back (z = -h)
    [0, 2, 1], [0, 3, 2],
    // Front (z = +h)
    [4, 5, 6], [4, 6, 7],
    // Left (x = -h)
    [0, 4, 7], [0, 7, 3],
    // Right (x = +h)
    [1, 2, 6], [1, 6, 5],
    // Bottom (y = -h)
    [0, 1, 5], [0, 5, 4],
    // Top (y = +h)
    [3, 7, 6], [3, 6, 2],
  ]);
}

export function tetrahedron(id: number, size: number): TriangleMesh {
  ensure(size > 0, "Tetrahedron size must be positive");

  const vertices: Vec3[] = [
    [0, size, 0],
    [-size, -size, -size],
    [size, -size, -size],
    [0, -size, size],
  ];

  return meshFromFaces(id, vertices, [
    [0, 2, 1],
    [0, 3, 2],
    [0, 1, 3],
    [1, 2, 3],
  ]);
}

/** Square base (two triangles) and four sides. */
export function pyramid(id: number, baseSize: number, height: number): TriangleMesh {
  ensure(baseSize > 0, "Pyramid base size must be positive");
  ensure(height > 0, "Pyramid height must be positive");
  const b = baseSize / 2;
  const y = height / 2;

  const vertices: Vec3[] = [
    [0, y, 0],   // apex
    [-b, -y, -b],
    [b, -y, -b],
    [b, -y, b],
    [-b, -y, b],
  ];

  return meshFromFaces(id, vertices, [
    [1, 2, 3], [1, 3, 4],
    [0, 2, 1],
    [0, 3, 2],
    [0, 4, 3],
    [0, 1, 4],
  ]);
}
