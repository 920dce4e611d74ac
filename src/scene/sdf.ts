/**
 * Signed distance fields and sphere tracing for analytic shapes.
 */

import { config } from "../config";
import { GeometryError } from "../errors";
import { abs3, add, length, normalize, scale, sub, type Vec3 } from "../math/vec3";

// =============================================================================
// Normals
// =============================================================================

/** Central-difference gradient of `sdf` at `p`, normalised. */
export function estimateNormal(
  sdf: (p: Vec3) => number,
  p: Vec3,
  eps: number = config.sdf.normalEps
): Vec3 {
  const nx = sdf([p[0] + eps, p[1], p[2]]) - sdf([p[0] - eps, p[1], p[2]]);
  const ny = sdf([p[0], p[1] + eps, p[2]]) - sdf([p[0], p[1] - eps, p[2]]);
  const nz = sdf([p[0], p[1], p[2] + eps]) - sdf([p[0], p[1], p[2] - eps]);
  return normalize([nx, ny, nz]);
}

// =============================================================================
// SDF Base and Primitives
// =============================================================================

export abstract class SDF {
  abstract evaluate(p: Vec3): number;

  normalAt(p: Vec3): Vec3 {
    return estimateNormal((q) => this.evaluate(q), p);
  }
}

export class SDFSphere extends SDF {
  constructor(
    readonly radius: number = 1.0,
    readonly center: Vec3 = [0, 0, 0]
  ) {
    super();
    if (!(radius > 0)) throw new GeometryError("Sphere radius must be positive");
  }

  evaluate(p: Vec3): number {
    return length(sub(p, this.center)) - this.radius;
  }

  normalAt(p: Vec3): Vec3 {
    return normalize(sub(p, this.center));
  }
}

export class SDFBox extends SDF {
  readonly halfSize: Vec3;

  constructor(
    size: Vec3 = [1, 1, 1],
    readonly center: Vec3 = [0, 0, 0]
  ) {
    super();
    if (!size.every((s) => s > 0)) throw new GeometryError("Box size must be positive");
    this.halfSize = scale(size, 0.5);
  }

  evaluate(p: Vec3): number {
    const q = sub(abs3(sub(p, this.center)), this.halfSize);
    const outside: Vec3 = [Math.max(q[0], 0), Math.max(q[1], 0), Math.max(q[2], 0)];
    return length(outside) + Math.min(Math.max(q[0], Math.max(q[1], q[2])), 0);
  }

  /** Axis of the face nearest `p`, signed by side. */
  normalAt(p: Vec3): Vec3 {
    const local = sub(p, this.center);
    let axis = 0;
    let best = Infinity;
    for (let i = 0; i < 3; i++) {
      const gap = Math.abs(Math.abs(local[i]!) - this.halfSize[i]!);
      if (gap < best) {
        best = gap;
        axis = i;
      }
    }
    const n: Vec3 = [0, 0, 0];
    n[axis] = local[axis]! < 0 ? -1 : 1;
    return n;
  }
}

export class SDFTorus extends SDF {
  constructor(
    readonly majorRadius: number = 1.0,
    readonly minorRadius: number = 0.25
  ) {
    super();
  }

  evaluate(p: Vec3): number {
    const xzLen = Math.sqrt(p[0] * p[0] + p[2] * p[2]);
    const q: [number, number] = [xzLen - this.majorRadius, p[1]];
    return Math.sqrt(q[0] * q[0] + q[1] * q[1]) - this.minorRadius;
  }
}

// =============================================================================
// Convenience Constructors (primitives)
// =============================================================================

export const primitives = {
  sphere: (radius: number = 1.0, center: Vec3 = [0, 0, 0]) =>
    new SDFSphere(radius, center),

  box: (size: Vec3 | number = 1, center: Vec3 = [0, 0, 0]) => {
    const s: Vec3 = typeof size === "number" ? [size, size, size] : size;
    return new SDFBox(s, center);
  },

  torus: (majorRadius: number = 1.0, minorRadius: number = 0.25) =>
    new SDFTorus(majorRadius, minorRadius),
};

// =============================================================================
// Sphere Tracing
// =============================================================================

export interface SphereTraceConfig {
  maxSteps?: number;
  hitThreshold?: number;
}

/**
 * Marches from `tStart` toward `tEnd` along a unit `direction`, stepping by
 * the field value. Returns the hit distance or null.
 */
export function sphereTrace(
  sdf: SDF,
  origin: Vec3,
  direction: Vec3,
  tStart: number,
  tEnd: number,
  cfg: SphereTraceConfig = {}
): number | null {
  const maxSteps = cfg.maxSteps ?? config.sdf.maxSteps;
  const hitThreshold = cfg.hitThreshold ?? config.sdf.hitThreshold;

  let t = tStart;
  for (let step = 0; step < maxSteps; step++) {
    const d = sdf.evaluate(add(origin, scale(direction, t)));
    if (d < hitThreshold) return t;
    t += d;
    if (t > tEnd) return null;
  }
  return null;
}
