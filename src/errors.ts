/**
 * Errors raised when constructing invalid values.
 */

export class GeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class NoSuchShapeError extends Error {
  constructor(readonly shapeId: number) {
    super(`No shape with id ${shapeId}`);
    this.name = this.constructor.name;
  }
}

export function ensure(condition: boolean, message: string): asserts condition {
  if (!condition) throw new GeometryError(message);
}
