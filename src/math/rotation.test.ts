import { describe, test, expect } from "vitest";
import { seededRandom } from "../scene/utils";
import { Rotation } from "./rotation";
import { approxEqual, type Vec3 } from "./vec3";

function expectClose(actual: Vec3, expected: Vec3, eps = 1e-9) {
  expect(approxEqual(actual, expected, eps), `${actual} vs ${expected}`).toBe(true);
}

describe("Rotation", () => {
  test("ZERO is the identity", () => {
    expect(Rotation.ZERO.applyTo([1, 2, 3])).toEqual([1, 2, 3]);
  });

  test("yaw turns about Z", () => {
    expectClose(new Rotation(Math.PI / 2, 0, 0).applyTo([1, 0, 0]), [0, 1, 0]);
  });

  test("pitch turns about Y", () => {
    expectClose(new Rotation(0, Math.PI / 2, 0).applyTo([1, 0, 0]), [0, 0, -1]);
  });

  test("roll turns about X", () => {
    expectClose(new Rotation(0, 0, Math.PI / 2).applyTo([0, 1, 0]), [0, 0, 1]);
  });

  test("roll is applied first, then pitch, then yaw", () => {
    // pitch takes +Z to +X, then yaw takes +X to +Y
    expectClose(new Rotation(Math.PI / 2, Math.PI / 2, 0).applyTo([0, 0, 1]), [0, 1, 0]);
  });

  test("inverse undoes the rotation", () => {
    const rng = seededRandom(7);
    for (let i = 0; i < 50; i++) {
      const r = new Rotation(rng() * 10 - 5, rng() * 10 - 5, rng() * 10 - 5);
      const v: Vec3 = [rng() * 20 - 10, rng() * 20 - 10, rng() * 20 - 10];
      expectClose(r.inverse.applyTo(r.applyTo(v)), v, 1e-6);
    }
  });

  test("inverse is cached", () => {
    const r = new Rotation(0.3, 0.2, 0.1);
    expect(r.inverse).toBe(r.inverse);
  });

  test("transformNormal matches applyTo for rigid rotations", () => {
    const r = new Rotation(0.4, -1.1, 2.0);
    expect(r.transformNormal([0, 0, 1])).toEqual(r.applyTo([0, 0, 1]));
  });

  test("rotate adds angles", () => {
    const r = new Rotation(0.1, 0.2, 0.3).rotate(new Rotation(1, 2, 3));
    expect(r.yaw).toBeCloseTo(1.1);
    expect(r.pitch).toBeCloseTo(2.2);
    expect(r.roll).toBeCloseTo(3.3);
  });

  test("non-finite angles produce a non-finite matrix", () => {
    expect(new Rotation(NaN, 0, 0).isFinite()).toBe(false);
    expect(new Rotation(1, 2, 3).isFinite()).toBe(true);
  });

  test("toDegrees", () => {
    const [yaw, pitch, roll] = new Rotation(Math.PI, Math.PI / 2, 0).toDegrees();
    expect(yaw).toBeCloseTo(180);
    expect(pitch).toBeCloseTo(90);
    expect(roll).toBe(0);
  });
});
