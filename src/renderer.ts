/**
 * Depth-buffered forward renderer: one orthographic ray per character cell,
 * cast along -Z, shaded with a single directional light.
 */

import { config } from "./config";
import { ensure } from "./errors";
import { AABB } from "./geometry/aabb";
import type { RotationMatrix } from "./math/rotation";
import { isFiniteVec3, isZero, sub, type Vec3 } from "./math/vec3";
import { combineMetrics, emptyMetrics, type RenderMetrics, type TraversalMetrics } from "./metrics";
import { intersectShape, shapeBounds } from "./scene/shapes";
import type { Frame, Placement } from "./scene/types";
import { shadeChar, type ShadingOptions } from "./shading";

// =============================================================================
// Types
// =============================================================================

export interface RendererConfig {
  ramp?: string;
  blank?: string;
  levels?: number;
  xScale?: number;
  /** Row bands rendered with separate counters, merged at the end. */
  bands?: number;
  ambient?: number;
  /** Vector pointing toward the light, in world space. */
  lightDirection?: Vec3;
}

export interface RenderResult {
  /** Rows joined by newlines. */
  output: string;
  rows: string[];
  metrics: RenderMetrics;
  /** One line per placement that could not be rendered. */
  diagnostics: string[];
}

/** The local ray for a placement only depends on the cell through its origin. */
interface PreparedPlacement {
  placement: Placement;
  inverse: RotationMatrix;
  localDirection: Vec3;
  worldBounds: AABB;
}

interface Band {
  start: number;
  end: number;
}

const VIEW_DIRECTION: Vec3 = [0, 0, -1];

// =============================================================================
// Forward Renderer
// =============================================================================

export class ForwardRenderer {
  readonly ramp: string;
  readonly blank: string;
  readonly levels: number;
  readonly xScale: number;
  readonly bands: number;
  readonly ambient: number;
  readonly lightDirection: Vec3;

  constructor(cfg: RendererConfig = {}) {
    this.ramp = cfg.ramp ?? config.render.ramp;
    this.blank = cfg.blank ?? config.render.blank;
    this.levels = cfg.levels ?? config.render.levels;
    this.xScale = cfg.xScale ?? config.render.xScale;
    this.bands = cfg.bands ?? config.render.bands;
    this.ambient = cfg.ambient ?? config.lighting.ambient;
    this.lightDirection = cfg.lightDirection ?? config.lighting.direction;

    ensure(this.ramp.length > 0, "Shading ramp must not be empty");
    ensure(this.blank.length === 1, "Blank marker must be a single character");
    ensure(Number.isInteger(this.levels) && this.levels >= 1, "Shading levels must be a positive integer");
    ensure(Number.isInteger(this.xScale) && this.xScale >= 1, "xScale must be a positive integer");
    ensure(Number.isInteger(this.bands) && this.bands >= 1, "bands must be a positive integer");
    ensure(this.ambient >= 0 && this.ambient <= 1, "Ambient light must be within [0, 1]");
    ensure(
      isFiniteVec3(this.lightDirection) && !isZero(this.lightDirection),
      "Light direction must be a finite, non-zero vector"
    );
  }

  private get shading(): ShadingOptions {
    return {
      lightDirection: this.lightDirection,
      ambient: this.ambient,
      ramp: this.ramp,
      levels: this.levels,
    };
  }

  render(frame: Frame, placements: readonly Placement[]): RenderResult {
    const started = performance.now();
    const { width, height, depth } = frame;
    const origin: Vec3 = frame.origin ?? [0, 0, 0];

    if (width <= 0 || height <= 0) {
      return {
        output: "",
        rows: [],
        metrics: {
          rays: 0,
          cellsFilled: 0,
          placementsRendered: 0,
          placementsSkipped: placements.length,
          traversal: emptyMetrics(),
          elapsedMs: performance.now() - started,
        },
        diagnostics: [],
      };
    }

    const diagnostics: string[] = [];
    const prepared = this.prepare(frame, origin, placements, diagnostics);

    const cells: string[] = new Array(width * height).fill(this.blank);
    const depthBuffer = new Float64Array(width * height).fill(Infinity);

    let traversal = emptyMetrics();
    for (const band of splitBands(height, this.bands)) {
      const bandMetrics = emptyMetrics();
      this.renderBand(band, frame, origin, prepared, cells, depthBuffer, bandMetrics);
      traversal = combineMetrics(traversal, bandMetrics);
    }

    const rows: string[] = [];
    let cellsFilled = 0;
    for (let row = 0; row < height; row++) {
      let line = "";
      for (let col = 0; col < width; col++) {
        const ch = cells[row * width + col]!;
        if (depthBuffer[row * width + col]! < Infinity) cellsFilled++;
        line += ch.repeat(this.xScale);
      }
      rows.push(line);
    }

    return {
      output: rows.join("\n"),
      rows,
      metrics: {
        rays: width * height,
        cellsFilled,
        placementsRendered: prepared.length,
        placementsSkipped: placements.length - prepared.length,
        traversal,
        elapsedMs: performance.now() - started,
      },
      diagnostics,
    };
  }

  /** Drops placements that cannot be rendered or cannot reach the frame. */
  private prepare(
    frame: Frame,
    origin: Vec3,
    placements: readonly Placement[],
    diagnostics: string[]
  ): PreparedPlacement[] {
    const frameBox = new AABB(origin, [origin[0] + frame.width, origin[1] + frame.height, origin[2] + frame.depth]);
    const out: PreparedPlacement[] = [];

    for (const placement of placements) {
      const { rotation, shape } = placement;
      if (!isFiniteVec3(placement.origin) || !rotation.isFinite()) {
        diagnostics.push(`Skipped shape ${shape.id}: non-finite origin or rotation`);
        continue;
      }

      const worldBounds = shapeBounds(shape).transformed(rotation, placement.origin);
      if (!worldBounds.overlaps(frameBox)) continue;

      const inverse = rotation.inverse;
      out.push({
        placement,
        inverse,
        localDirection: inverse.applyTo(VIEW_DIRECTION),
        worldBounds,
      });
    }

    return out;
  }

  private renderBand(
    band: Band,
    frame: Frame,
    origin: Vec3,
    prepared: readonly PreparedPlacement[],
    cells: string[],
    depthBuffer: Float64Array,
    metrics: TraversalMetrics
  ): void {
    const { width, depth } = frame;
    const shading = this.shading;
    const rayZ = origin[2] + depth;

    for (let row = band.start; row < band.end; row++) {
      const y = origin[1] + row;
      for (let col = 0; col < width; col++) {
        const x = origin[0] + col;
        const idx = row * width + col;

        for (const p of prepared) {
          const { min, max } = p.worldBounds;
          if (x < min[0] || x > max[0] || y < min[1] || y > max[1]) continue;

          const localOrigin = p.inverse.applyTo(sub([x, y, rayZ], p.placement.origin));
          const hit = intersectShape(p.placement.shape, localOrigin, p.localDirection, metrics);
          if (hit === null || hit.distance > depth || !(hit.distance < depthBuffer[idx]!)) continue;

          depthBuffer[idx] = hit.distance;
          cells[idx] = shadeChar(p.placement.rotation.transformNormal(hit.normal), shading);
        }
      }
    }
  }
}

/** Contiguous row ranges covering [0, height). */
export function splitBands(height: number, bands: number): Band[] {
  const size = Math.ceil(height / Math.max(1, bands));
  const out: Band[] = [];
  for (let start = 0; start < height; start += size) {
    out.push({ start, end: Math.min(height, start + size) });
  }
  return out;
}
