/**
 * Frame building and terminal playback: a timed rotation loop and an
 * interactive keyboard-driven viewer.
 */

import { config } from "./config";
import { applyKey, splitKeys, type ViewState } from "./input";
import { Rotation } from "./math/rotation";
import { formatRenderMetrics } from "./metrics";
import type { ForwardRenderer, RenderResult } from "./renderer";
import type { Frame } from "./scene/types";
import type { World } from "./scene/world";

/** Clear screen and home the cursor. */
export const CLEAR = "\x1b[2J\x1b[H";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";

// =============================================================================
// Frames
// =============================================================================

/** Radians per frame. */
export interface RotationRates {
  yaw?: number;
  pitch?: number;
  roll?: number;
}

export interface AnimationFrame {
  text: string;
  rotation: Rotation;
  result: RenderResult;
}

function wrapDegrees(radians: number): number {
  return ((radians * 180) / Math.PI) % 360;
}

export function rotationSummary(frameIndex: number, rotation: Rotation): string {
  const fmt = (r: number) => `${wrapDegrees(r).toFixed(1).padStart(6)}°`;
  return [
    `Frame: ${String(frameIndex).padStart(3)}`,
    `Yaw:   ${fmt(rotation.yaw)}`,
    `Pitch: ${fmt(rotation.pitch)}`,
    `Roll:  ${fmt(rotation.roll)}`,
  ].join("  ");
}

/**
 * Renders `world` with `shapeId` at its absolute rotation for `frameIndex`
 * (not accumulated from the previous frame), followed by a summary line.
 */
export function buildFrame(
  world: World,
  shapeId: number,
  frameIndex: number,
  rates: RotationRates,
  renderer: ForwardRenderer,
  frame: Frame = world
): AnimationFrame {
  const rotation = new Rotation(
    frameIndex * (rates.yaw ?? config.animation.yawRate),
    frameIndex * (rates.pitch ?? config.animation.pitchRate),
    frameIndex * (rates.roll ?? config.animation.rollRate)
  );
  const rotated = world.orient(shapeId, rotation);
  const result = renderer.render(frame, rotated.placements());
  return {
    text: `${result.output}\n\n${rotationSummary(frameIndex, rotation)}`,
    rotation,
    result,
  };
}

// =============================================================================
// Playback
// =============================================================================

export interface AnimateOptions {
  world: World;
  shapeId: number;
  renderer: ForwardRenderer;
  rates?: RotationRates;
  frame?: Frame;
  fps?: number;
  /** Stop after this many frames; runs until stopped when omitted. */
  frames?: number;
  showMetrics?: boolean;
  write?: (chunk: string) => void;
}

export interface PlaybackHandle {
  stop(): void;
  /** Resolves once playback has stopped. */
  done: Promise<void>;
}

export function animate(opts: AnimateOptions): PlaybackHandle {
  const fps = opts.fps ?? config.animation.fps;
  const write = opts.write ?? ((chunk: string) => process.stdout.write(chunk));
  const rates = opts.rates ?? {};

  let frameIndex = 0;
  let timer: ReturnType<typeof setInterval> | null = null;
  let finish: () => void = () => {};
  const done = new Promise<void>((resolve) => {
    finish = resolve;
  });

  const stop = () => {
    if (timer === null) return;
    clearInterval(timer);
    timer = null;
    finish();
  };

  const tick = () => {
    if (opts.frames !== undefined && frameIndex >= opts.frames) {
      stop();
      return;
    }
    const built = buildFrame(opts.world, opts.shapeId, frameIndex, rates, opts.renderer, opts.frame ?? opts.world);
    let out = CLEAR + built.text + "\n";
    if (opts.showMetrics) out += formatRenderMetrics(built.result.metrics) + "\n";
    write(out);
    frameIndex++;
  };

  timer = setInterval(tick, 1000 / fps);
  tick();

  return { stop, done };
}

// =============================================================================
// Interactive
// =============================================================================

/** The parts of `process.stdin` the viewer uses. */
export interface KeyInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: "data", listener: (data: Buffer) => void): unknown;
  off(event: "data", listener: (data: Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface InteractiveOptions {
  state: ViewState;
  renderer: ForwardRenderer;
  input?: KeyInput;
  write?: (chunk: string) => void;
  showMetrics?: boolean;
}

function drawState(state: ViewState, renderer: ForwardRenderer, showMetrics: boolean): string {
  const result = renderer.render(state.viewport, state.world.placements());
  const placement = state.world.get(state.shapeId);
  const rotation = placement ? placement.rotation : Rotation.ZERO;
  const [yaw, pitch, roll] = rotation.toDegrees();
  const lines = [
    CLEAR + result.output,
    "",
    `Yaw ${yaw.toFixed(0)}°  Pitch ${pitch.toFixed(0)}°  Roll ${roll.toFixed(0)}°  View ${state.viewport.width}x${state.viewport.height} at ${state.viewport.origin.join(",")}`,
    "w/s pitch  a/d yaw  z/x roll  +/- zoom  arrows pan  r reset  v view  q quit",
  ];
  if (showMetrics) lines.push(formatRenderMetrics(result.metrics));
  return lines.join("\n") + "\n";
}

/** Redraws on every bound key press; resolves with the final state on quit. */
export function interactive(opts: InteractiveOptions): Promise<ViewState> {
  const input: KeyInput = opts.input ?? process.stdin;
  const write = opts.write ?? ((chunk: string) => process.stdout.write(chunk));
  const showMetrics = opts.showMetrics ?? false;
  let state = opts.state;

  return new Promise((resolve) => {
    const finish = () => {
      input.off("data", onData);
      if (input.isTTY) input.setRawMode?.(false);
      input.pause();
      write(SHOW_CURSOR);
      resolve(state);
    };

    const onData = (data: Buffer) => {
      let next = state;
      for (const key of splitKeys(data.toString("utf8"))) {
        next = applyKey(next, key);
        if (next.quit) break;
      }
      if (next === state) return;
      state = next;
      if (state.quit) {
        finish();
        return;
      }
      write(drawState(state, opts.renderer, showMetrics));
    };

    if (input.isTTY) input.setRawMode?.(true);
    input.on("data", onData);
    input.resume();
    write(HIDE_CURSOR + drawState(state, opts.renderer, showMetrics));
  });
}
