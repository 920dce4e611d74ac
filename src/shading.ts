/**
 * Lambert shading quantised onto a character ramp.
 */

import { clamp, dot, normalize, type Vec3 } from "./math/vec3";

/** ambient + (1 - ambient) * max(0, n . L), clamped to [0, 1]. */
export function brightness(normal: Vec3, lightDirection: Vec3, ambient: number): number {
  const diffuse = Math.max(0, dot(normalize(normal), normalize(lightDirection)));
  return clamp(ambient + (1 - ambient) * diffuse, 0, 1);
}

/** Snaps to one of `levels` evenly spaced values in [0, 1]. */
export function quantize(value: number, levels: number): number {
  if (levels <= 1) return 1;
  const steps = levels - 1;
  return Math.round(clamp(value, 0, 1) * steps) / steps;
}

export function rampIndex(value: number, ramp: string): number {
  return clamp(Math.round(value * (ramp.length - 1)), 0, ramp.length - 1);
}

export interface ShadingOptions {
  lightDirection: Vec3;
  ambient: number;
  ramp: string;
  levels: number;
}

export function shadeChar(normal: Vec3, opts: ShadingOptions): string {
  const b = quantize(brightness(normal, opts.lightDirection, opts.ambient), opts.levels);
  return opts.ramp.charAt(rampIndex(b, opts.ramp));
}
