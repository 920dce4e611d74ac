/**
 * World-space crop window. `origin` is the minimum corner; the renderer casts
 * rays for x in [ox, ox + width) and y in [oy, oy + height), from z = oz + depth
 * toward oz.
 */

import { ensure } from "../errors";
import { add, type Vec3 } from "../math/vec3";
import type { Frame } from "./types";

function half(n: number): number {
  return Math.floor(n / 2);
}

export class Viewport implements Frame {
  constructor(
    readonly origin: Vec3,
    readonly width: number,
    readonly height: number,
    readonly depth: number
  ) {
    for (const [name, value] of [["width", width], ["height", height], ["depth", depth]] as const) {
      ensure(Number.isInteger(value) && value > 0, `Viewport ${name} must be a positive integer`);
    }
  }

  static centeredAt(center: Vec3, width: number, height: number, depth: number): Viewport {
    const origin: Vec3 = [center[0] - half(width), center[1] - half(height), center[2] - half(depth)];
    return new Viewport(origin, width, height, depth);
  }

  get center(): Vec3 {
    return add(this.origin, [half(this.width), half(this.height), half(this.depth)]);
  }

  pan(offset: Vec3): Viewport {
    return new Viewport(add(this.origin, offset), this.width, this.height, this.depth);
  }

  /** Factors above 1 zoom in (smaller window). The centre stays put. */
  zoom(factor: number): Viewport {
    ensure(factor > 0, "Zoom factor must be positive");
    return Viewport.centeredAt(
      this.center,
      Math.max(1, Math.floor(this.width / factor)),
      Math.max(1, Math.floor(this.height / factor)),
      Math.max(1, Math.floor(this.depth / factor))
    );
  }
}
