/**
 * Library entry point.
 */

export * from "./math/vec3";
export { Rotation, RotationMatrix, type Mat3 } from "./math/rotation";
export { AABB, type SlabHit } from "./geometry/aabb";
export { Triangle, TriangleMesh, type TriangleHit } from "./geometry/triangle";
export { BVH, buildAcceleration, type BVHConfig, type BVHNode, type BVHStats } from "./geometry/bvh";
export { parseOBJ, loadOBJ, ObjParseError } from "./geometry/obj";
export * from "./metrics";
export * from "./shading";
export { ForwardRenderer, type RendererConfig, type RenderResult } from "./renderer";
export * from "./scene";
export { buildFrame, animate, interactive, rotationSummary, type RotationRates } from "./animation";
export { rotationForKey, actionForKey, applyAction, applyKey, type KeyAction, type ViewState } from "./input";
export { GeometryError, NoSuchShapeError } from "./errors";
export { config, type Config } from "./config";
export type { Result } from "./utils/result";
