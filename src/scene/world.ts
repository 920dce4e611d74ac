/**
 * Immutable container of placed shapes, keyed by shape id.
 */

import { ensure, NoSuchShapeError } from "../errors";
import { Rotation } from "../math/rotation";
import type { Vec3 } from "../math/vec3";
import type { Frame, Placement, Shape } from "./types";

export class World implements Frame {
  private readonly shapes: ReadonlyMap<number, Placement>;

  constructor(
    readonly width: number,
    readonly height: number,
    readonly depth: number,
    shapes: Iterable<[number, Placement]> = []
  ) {
    for (const [name, value] of [["width", width], ["height", height], ["depth", depth]] as const) {
      ensure(Number.isInteger(value) && value >= 0, `World ${name} must be a non-negative integer`);
    }
    this.shapes = new Map(shapes);
  }

  /** Adding an id that is already placed replaces that placement. */
  add(shape: Shape, origin: Vec3, rotation: Rotation = Rotation.ZERO): World {
    const next = new Map(this.shapes);
    next.set(shape.id, { origin, rotation, shape });
    return new World(this.width, this.height, this.depth, next);
  }

  rotate(shapeId: number, delta: Rotation): World {
    const placement = this.shapes.get(shapeId);
    if (!placement) throw new NoSuchShapeError(shapeId);
    const next = new Map(this.shapes);
    next.set(shapeId, { ...placement, rotation: placement.rotation.rotate(delta) });
    return new World(this.width, this.height, this.depth, next);
  }

  /** Sets the rotation outright rather than adding to it. */
  orient(shapeId: number, rotation: Rotation): World {
    const placement = this.shapes.get(shapeId);
    if (!placement) throw new NoSuchShapeError(shapeId);
    const next = new Map(this.shapes);
    next.set(shapeId, { ...placement, rotation });
    return new World(this.width, this.height, this.depth, next);
  }

  remove(shapeId: number): World {
    if (!this.shapes.has(shapeId)) return this;
    const next = new Map(this.shapes);
    next.delete(shapeId);
    return new World(this.width, this.height, this.depth, next);
  }

  reset(): World {
    return new World(this.width, this.height, this.depth);
  }

  get(shapeId: number): Placement | undefined {
    return this.shapes.get(shapeId);
  }

  placements(): Placement[] {
    return [...this.shapes.values()];
  }

  get size(): number {
    return this.shapes.size;
  }
}
