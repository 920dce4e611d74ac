/**
 * Procedural heightfield mesh driven by simplex noise.
 */

import { ensure } from "../../errors";
import { Triangle, TriangleMesh } from "../../geometry/triangle";
import type { Vec3 } from "../../math/vec3";
import { createNoiseGenerator, seededRandom } from "../utils";

export interface TerrainConfig {
  cols?: number;
  rows?: number;
  /** Distance between neighbouring grid points. */
  spacing?: number;
  amplitude?: number;
  /** Noise coordinates per grid step. */
  frequency?: number;
  octaves?: number;
  seed?: number;
}

/**
 * `cols x rows` cells in the XZ plane, centered on the origin, with heights
 * along -Y (up on screen) in `[-amplitude, amplitude]`. Two triangles per cell.
 */
export function terrain(id: number, cfg: TerrainConfig = {}): TriangleMesh {
  const cols = cfg.cols ?? 16;
  const rows = cfg.rows ?? 16;
  const spacing = cfg.spacing ?? 1;
  const amplitude = cfg.amplitude ?? 3;
  const frequency = cfg.frequency ?? 0.15;
  const octaves = cfg.octaves ?? 3;
  const seed = cfg.seed ?? 42;

  ensure(Number.isInteger(cols) && cols >= 1, "Terrain cols must be a positive integer");
  ensure(Number.isInteger(rows) && rows >= 1, "Terrain rows must be a positive integer");
  ensure(spacing > 0, "Terrain spacing must be positive");

  const noise = createNoiseGenerator(seededRandom(seed));
  const x0 = (-cols * spacing) / 2;
  const z0 = (-rows * spacing) / 2;

  const grid: Vec3[][] = [];
  for (let j = 0; j <= rows; j++) {
    const line: Vec3[] = [];
    for (let i = 0; i <= cols; i++) {
      const h = noise(i * frequency, j * frequency, octaves) * amplitude;
      line.push([x0 + i * spacing, -h, z0 + j * spacing]);
    }
    grid.push(line);
  }

  const triangles: Triangle[] = [];
  for (let j = 0; j < rows; j++) {
    for (let i = 0; i < cols; i++) {
      const a = grid[j]![i]!;
      const b = grid[j]![i + 1]!;
      const c = grid[j + 1]![i + 1]!;
      const d = grid[j + 1]![i]!;
      // Wound so the normals point toward -Y
      triangles.push(new Triangle(a, b, c), new Triangle(a, c, d));
    }
  }

  return new TriangleMesh(id, triangles);
}
