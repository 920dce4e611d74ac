/**
 * Shared utilities for scene system.
 */

import { createNoise2D } from "simplex-noise";
import { Triangle } from "../geometry/triangle";
import type { Vec3 } from "../math/vec3";

// =============================================================================
// Random
// =============================================================================

export function seededRandom(seed: number) {
  return () => {
    seed = (seed * 1103515245 + 12345) & 0x7fffffff;
    return seed / 0x7fffffff;
  };
}

export function randomPoint(rng: () => number, extent: number): Vec3 {
  return [
    (rng() * 2 - 1) * extent,
    (rng() * 2 - 1) * extent,
    (rng() * 2 - 1) * extent,
  ];
}

/** Unrelated triangles scattered through a cube of half-width `extent`. */
export function randomTriangles(rng: () => number, count: number, extent: number, spread: number = 1): Triangle[] {
  const out: Triangle[] = [];
  for (let i = 0; i < count; i++) {
    const c = randomPoint(rng, extent);
    const jitter = (): Vec3 => {
      const d = randomPoint(rng, spread);
      return [c[0] + d[0], c[1] + d[1], c[2] + d[2]];
    };
    out.push(new Triangle(jitter(), jitter(), jitter()));
  }
  return out;
}

// =============================================================================
// Noise
// =============================================================================

/** Fractal 2D simplex noise, normalised to [-1, 1]. */
export function createNoiseGenerator(rng: () => number) {
  const noise2D = createNoise2D(rng);

  return function fbm(x: number, y: number, octaves: number = 1): number {
    let value = 0;
    let amplitude = 1;
    let frequency = 1;
    let maxValue = 0;

    for (let i = 0; i < octaves; i++) {
      value += noise2D(x * frequency, y * frequency) * amplitude;
      maxValue += amplitude;
      amplitude *= 0.5;
      frequency *= 2;
    }

    return value / maxValue;
  };
}
