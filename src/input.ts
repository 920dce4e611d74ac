/**
 * Keyboard controls for the interactive viewer. Keys map to actions; actions
 * fold into a view state. Terminal handling lives in `animation.ts`.
 */

import { config } from "./config";
import { Rotation } from "./math/rotation";
import type { Vec3 } from "./math/vec3";
import type { Viewport } from "./scene/viewport";
import type { World } from "./scene/world";

// =============================================================================
// Actions
// =============================================================================

export type KeyAction =
  | { kind: "rotate"; delta: Rotation }
  | { kind: "zoom"; factor: number }
  | { kind: "pan"; offset: Vec3 }
  | { kind: "reset" }
  | { kind: "resetView" }
  | { kind: "quit" };

const ZOOM_IN = 1.2;
const ZOOM_OUT = 0.8;

/** w/s pitch, a/d yaw, z/x roll; case-insensitive. */
export function rotationForKey(key: string, step: number = config.animation.keyStep): Rotation | null {
  switch (key.toLowerCase()) {
    case "w":
      return new Rotation(0, step, 0);
    case "s":
      return new Rotation(0, -step, 0);
    case "a":
      return new Rotation(-step, 0, 0);
    case "d":
      return new Rotation(step, 0, 0);
    case "z":
      return new Rotation(0, 0, -step);
    case "x":
      return new Rotation(0, 0, step);
    default:
      return null;
  }
}

/** Screen rows grow downward, so "up" is -Y. */
export function actionForKey(key: string, step: number = config.animation.keyStep): KeyAction | null {
  const delta = rotationForKey(key, step);
  if (delta) return { kind: "rotate", delta };

  switch (key) {
    case "+":
    case "=":
      return { kind: "zoom", factor: ZOOM_IN };
    case "-":
      return { kind: "zoom", factor: ZOOM_OUT };
    case "\x1b[A":
      return { kind: "pan", offset: [0, -1, 0] };
    case "\x1b[B":
      return { kind: "pan", offset: [0, 1, 0] };
    case "\x1b[D":
    case "<":
      return { kind: "pan", offset: [-1, 0, 0] };
    case "\x1b[C":
    case ">":
      return { kind: "pan", offset: [1, 0, 0] };
    case "r":
    case "R":
      return { kind: "reset" };
    case "v":
    case "V":
      return { kind: "resetView" };
    case "q":
    case "Q":
    case "\x1b":
    case "\x03":
      return { kind: "quit" };
    default:
      return null;
  }
}

// =============================================================================
// View State
// =============================================================================

export interface ViewState {
  world: World;
  viewport: Viewport;
  shapeId: number;
  /** Restored by `reset` / `resetView`. */
  home: { rotation: Rotation; viewport: Viewport };
  quit: boolean;
}

export function applyAction(state: ViewState, action: KeyAction): ViewState {
  switch (action.kind) {
    case "rotate":
      return { ...state, world: state.world.rotate(state.shapeId, action.delta) };
    case "zoom":
      return { ...state, viewport: state.viewport.zoom(action.factor) };
    case "pan":
      return { ...state, viewport: state.viewport.pan(action.offset) };
    case "reset":
      return { ...state, world: state.world.orient(state.shapeId, state.home.rotation) };
    case "resetView":
      return { ...state, viewport: state.home.viewport };
    case "quit":
      return { ...state, quit: true };
    default: {
      const unreachable: never = action;
      return unreachable;
    }
  }
}

/** Splits a raw terminal read into keys, keeping arrow escape sequences whole. */
export function splitKeys(chunk: string): string[] {
  return chunk.match(/\x1b\[[A-D]|[\s\S]/g) ?? [];
}

/** Applies the key's action, or returns `state` unchanged for unbound keys. */
export function applyKey(state: ViewState, key: string, step?: number): ViewState {
  const action = actionForKey(key, step);
  return action ? applyAction(state, action) : state;
}
