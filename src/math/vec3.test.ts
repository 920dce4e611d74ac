import { describe, test, expect } from "vitest";
import {
  add,
  approxEqual,
  clamp,
  cross,
  dot,
  isFiniteVec3,
  length,
  normalize,
  sub,
} from "./vec3";

describe("vector helpers", () => {
  test("add and sub are inverse", () => {
    expect(sub(add([1, 2, 3], [4, 5, 6]), [4, 5, 6])).toEqual([1, 2, 3]);
  });

  test("cross follows the right-hand rule", () => {
    expect(cross([1, 0, 0], [0, 1, 0])).toEqual([0, 0, 1]);
    expect(cross([0, 1, 0], [1, 0, 0])).toEqual([0, 0, -1]);
  });

  test("dot and length", () => {
    expect(dot([1, 2, 3], [4, -5, 6])).toBe(12);
    expect(length([3, 4, 12])).toBe(13);
  });

  test("normalize returns a unit vector", () => {
    expect(normalize([0, 3, 4])).toEqual([0, 0.6, 0.8]);
  });

  test("normalize leaves the zero vector alone", () => {
    expect(normalize([0, 0, 0])).toEqual([0, 0, 0]);
  });

  test("clamp", () => {
    expect(clamp(1.5, 0, 1)).toBe(1);
    expect(clamp(-2, 0, 1)).toBe(0);
  });

  test("isFiniteVec3 rejects NaN and Infinity", () => {
    expect(isFiniteVec3([1, 2, 3])).toBe(true);
    expect(isFiniteVec3([NaN, 0, 0])).toBe(false);
    expect(isFiniteVec3([0, Infinity, 0])).toBe(false);
  });

  test("approxEqual uses an absolute tolerance", () => {
    expect(approxEqual([1, 1, 1], [1 + 1e-10, 1, 1])).toBe(true);
    expect(approxEqual([1, 1, 1], [1.001, 1, 1])).toBe(false);
    expect(approxEqual([1, 1, 1], [1.001, 1, 1], 0.01)).toBe(true);
  });
});
