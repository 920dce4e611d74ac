/**
 * Render defaults - edit this to change the look of a frame.
 */

import type { Vec3 } from "./math/vec3";

// =============================================================================
// Config
// =============================================================================

export const config = {
  render: {
    ramp: ".,:-=+*#%@",
    blank: " ",
    levels: 4,
    xScale: 2,
    bands: 1,
  },
  lighting: {
    ambient: 0.35,
    // Points toward the light: up-left and in front of the viewer.
    direction: [-1.0, -1.0, 1.0] as Vec3,
  },
  bvh: {
    maxLeafTriangles: 4,
    maxDepth: 20,
    binCount: 12,
    traversalCost: 0.125,
    intersectionCost: 1.0,
    sahEarlyLeaf: false,
    sahLeafMultiplier: 2,
  },
  sdf: {
    maxSteps: 64,
    hitThreshold: 0.001,
    normalEps: 0.001,
  },
  world: {
    width: 40,
    height: 22,
    depth: 40,
  },
  scene: {
    shapeId: 101,
    size: 14,
    // Starting yaw, pitch, roll in degrees
    rotation: [0, 35, 25] as Vec3,
    seed: 42,
  },
  animation: {
    fps: 15,
    yawRate: Math.PI / 60,
    pitchRate: 0,
    rollRate: Math.PI / 90,
    keyStep: Math.PI / 18,
  },
};

export type Config = typeof config;
