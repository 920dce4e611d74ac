/**
 * Scene utilities - types, shapes, containers, and models.
 */

export * from "./types";
export * from "./shapes";
export * from "./sdf";
export { World } from "./world";
export { Viewport } from "./viewport";
export { cube, tetrahedron, pyramid } from "./models/primitives";
export { terrain, type TerrainConfig } from "./models/terrain";
export { seededRandom, createNoiseGenerator, randomTriangles } from "./utils";
