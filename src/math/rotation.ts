/**
 * Euler rotations with a precomputed 3x3 matrix.
 *
 * `applyTo` rotates roll (X) first, then pitch (Y), then yaw (Z), i.e. the
 * matrix is Rz(yaw) * Ry(pitch) * Rx(roll).
 */

import type { Vec3 } from "./vec3";

/** Row-major 3x3 matrix. */
export type Mat3 = readonly [Vec3, Vec3, Vec3];

// =============================================================================
// Rotation Matrix
// =============================================================================

export class RotationMatrix {
  constructor(readonly rows: Mat3) {}

  applyTo(v: Vec3): Vec3 {
    const [r0, r1, r2] = this.rows;
    return [
      r0[0] * v[0] + r0[1] * v[1] + r0[2] * v[2],
      r1[0] * v[0] + r1[1] * v[1] + r1[2] * v[2],
      r2[0] * v[0] + r2[1] * v[1] + r2[2] * v[2],
    ];
  }

  /**
   * Normals transform by the inverse-transpose of the model matrix. For an
   * orthogonal matrix that is the matrix itself; keep calling this rather than
   * `applyTo` for normals so a non-rigid transform only has to change here.
   */
  transformNormal(n: Vec3): Vec3 {
    return this.applyTo(n);
  }

  transposed(): RotationMatrix {
    const [r0, r1, r2] = this.rows;
    return new RotationMatrix([
      [r0[0], r1[0], r2[0]],
      [r0[1], r1[1], r2[1]],
      [r0[2], r1[2], r2[2]],
    ]);
  }

  isFinite(): boolean {
    return this.rows.every((row) => row.every((x) => Number.isFinite(x)));
  }
}

// =============================================================================
// Rotation
// =============================================================================

export class Rotation extends RotationMatrix {
  static readonly ZERO = new Rotation(0, 0, 0);

  private inverseMatrix: RotationMatrix | null = null;

  constructor(
    readonly yaw: number,
    readonly pitch: number,
    readonly roll: number
  ) {
    const sy = Math.sin(yaw);
    const cy = Math.cos(yaw);
    const sp = Math.sin(pitch);
    const cp = Math.cos(pitch);
    const sr = Math.sin(roll);
    const cr = Math.cos(roll);

    super([
      [cy * cp, cy * sp * sr - sy * cr, cy * sp * cr + sy * sr],
      [sy * cp, sy * sp * sr + cy * cr, sy * sp * cr - cy * sr],
      [-sp, cp * sr, cp * cr],
    ]);
  }

  /** Negated angles applied in reverse order: the transpose. */
  get inverse(): RotationMatrix {
    if (this.inverseMatrix === null) {
      this.inverseMatrix = this.transposed();
    }
    return this.inverseMatrix;
  }

  rotate(delta: Rotation): Rotation {
    return new Rotation(
      this.yaw + delta.yaw,
      this.pitch + delta.pitch,
      this.roll + delta.roll
    );
  }

  toDegrees(): Vec3 {
    const deg = 180 / Math.PI;
    return [this.yaw * deg, this.pitch * deg, this.roll * deg];
  }
}
