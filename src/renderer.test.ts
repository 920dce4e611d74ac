import { describe, test, expect } from "vitest";
import { Rotation } from "./math/rotation";
import { ForwardRenderer, splitBands } from "./renderer";
import { cube } from "./scene/models/primitives";
import { boxShape, meshShape } from "./scene/shapes";
import type { Placement } from "./scene/types";
import { Viewport } from "./scene/viewport";
import { World } from "./scene/world";

const BLANK_ROW = "        ";

/** 4x2x2 box centred in an 8x6x10 world, front face at z = 6. */
function slabWorld(): World {
  return new World(8, 6, 10).add(boxShape(1, 4, 2, 2), [3.5, 2.5, 5]);
}

const flat = new ForwardRenderer({ xScale: 1 });

/** 20x20 frame with a 9x9 block of `fill` in rows and columns 6 to 14. */
function centredSquare(fill: string): string[] {
  const blank = " ".repeat(20);
  const line = " ".repeat(6) + fill.repeat(9) + " ".repeat(5);
  return Array.from({ length: 20 }, (_, row) => (row >= 6 && row <= 14 ? line : blank));
}

/** 20x20 frame from the rows that are not blank, starting at `firstRow`. */
function frameRows(firstRow: number, rows: string[]): string[] {
  const blank = " ".repeat(20);
  return Array.from({ length: 20 }, (_, row) => rows[row - firstRow] ?? blank);
}

describe("ForwardRenderer", () => {
  test("draws the visible face with the ramp", () => {
    const world = slabWorld();
    const result = flat.render(world, world.placements());
    expect(result.rows).toEqual([BLANK_ROW, BLANK_ROW, "  ****  ", "  ****  ", BLANK_ROW, BLANK_ROW]);
    expect(result.output).toBe(result.rows.join("\n"));
    expect(result.diagnostics).toEqual([]);
  });

  test("reports render metrics", () => {
    const world = slabWorld();
    const { metrics } = flat.render(world, world.placements());
    expect(metrics.rays).toBe(48);
    expect(metrics.cellsFilled).toBe(8);
    expect(metrics.placementsRendered).toBe(1);
    expect(metrics.placementsSkipped).toBe(0);
    expect(metrics.traversal.boxTests).toBe(8);
    expect(metrics.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  test("keeps the nearest surface regardless of placement order", () => {
    const near: Placement = {
      origin: [3.5, 2.5, 8],
      rotation: new Rotation(0, 0, Math.PI / 4),
      shape: boxShape(2, 2, 2, 2),
    };
    const far: Placement = { origin: [3.5, 2.5, 5], rotation: Rotation.ZERO, shape: boxShape(1, 4, 2, 2) };
    const expected = [BLANK_ROW, BLANK_ROW, "  *@@*  ", "  *--*  ", BLANK_ROW, BLANK_ROW];

    const world = new World(8, 6, 10);
    expect(flat.render(world, [far, near]).rows).toEqual(expected);
    expect(flat.render(world, [near, far]).rows).toEqual(expected);
  });

  test("shades with the rotated normal", () => {
    const world = new World(8, 6, 10).add(boxShape(1, 4, 2, 2), [3.5, 2.5, 5], new Rotation(Math.PI / 2, 0, 0));
    expect(flat.render(world, world.placements()).rows).toEqual([
      BLANK_ROW,
      "   **   ",
      "   **   ",
      "   **   ",
      "   **   ",
      BLANK_ROW,
    ]);
  });

  test("cells on a box edge shade as the face the ray enters", () => {
    const world = new World(20, 20, 20).add(boxShape(1, 8, 8, 8), [10, 10, 10]);
    const rows = flat.render(world, world.placements()).rows;
    expect(rows).toEqual(centredSquare("*"));
    expect(rows[10]?.[6]).toBe("*");
    expect(rows[10]?.[14]).toBe("*");
  });

  test("repeats each cell xScale times", () => {
    const world = slabWorld();
    const wide = new ForwardRenderer({ xScale: 2 });
    expect(wide.render(world, world.placements()).rows[2]).toBe("    ********    ");
  });

  test("renders through a viewport", () => {
    const world = slabWorld();
    const view = new Viewport([2, 1, 0], 4, 3, 10);
    const result = new ForwardRenderer({ xScale: 2 }).render(view, world.placements());
    expect(result.rows).toEqual([BLANK_ROW, "********", "********"]);
    expect(result.metrics.rays).toBe(12);
  });

  test("a ray starting inside a shape sees its far side", () => {
    const world = slabWorld();
    const shallow = new World(8, 6, 5);
    expect(flat.render(shallow, world.placements()).rows[2]).toBe("  ----  ");
  });

  test("skips placements outside the frame without a diagnostic", () => {
    const world = slabWorld();
    const result = flat.render(new World(8, 6, 3), world.placements());
    expect(result.rows.every((row) => row === BLANK_ROW)).toBe(true);
    expect(result.metrics.placementsSkipped).toBe(1);
    expect(result.metrics.placementsRendered).toBe(0);
    expect(result.diagnostics).toEqual([]);
  });

  test("reports placements with non-finite transforms", () => {
    const world = slabWorld()
      .add(boxShape(7, 1, 1, 1), [Number.NaN, 0, 0])
      .add(boxShape(8, 1, 1, 1), [1, 1, 1], new Rotation(Infinity, 0, 0));
    const result = flat.render(world, world.placements());
    expect(result.diagnostics).toEqual([
      "Skipped shape 7: non-finite origin or rotation",
      "Skipped shape 8: non-finite origin or rotation",
    ]);
    expect(result.rows[2]).toBe("  ****  ");
    expect(result.metrics.placementsSkipped).toBe(2);
  });

  test("draws a mesh cube face on", () => {
    const world = new World(20, 20, 20).add(meshShape(cube(1, 8)), [10, 10, 10]);
    const result = flat.render(world, world.placements());
    expect(result.rows).toEqual(centredSquare("*"));
    expect(result.metrics.cellsFilled).toBe(81);
    expect(result.metrics.traversal.triangleHits).toBeGreaterThanOrEqual(81);
  });

  test("a mesh cube turned a quarter about the view axis looks the same", () => {
    const shape = meshShape(cube(1, 8));
    const still = new World(20, 20, 20).add(shape, [10, 10, 10]);
    const turned = new World(20, 20, 20).add(shape, [10, 10, 10], new Rotation(Math.PI / 2, 0, 0));
    expect(flat.render(turned, turned.placements()).rows).toEqual(flat.render(still, still.placements()).rows);
  });

  test("shades a rotated mesh with its world normals", () => {
    const world = new World(20, 20, 20).add(meshShape(cube(1, 4)), [10, 10.5, 16], new Rotation(0, 0, Math.PI / 4));
    expect(flat.render(world, world.placements()).rows).toEqual(
      frameRows(8, [
        "        @@@@@       ",
        "        @@@@@       ",
        "        @@@@@       ",
        "        -----       ",
        "        -----       ",
        "        -----       ",
      ])
    );
  });

  test("a mesh in front of a box hides it in either placement order", () => {
    const mesh: Placement = {
      origin: [10, 10.5, 16],
      rotation: new Rotation(0, 0, Math.PI / 4),
      shape: meshShape(cube(1, 4)),
    };
    const box: Placement = { origin: [10, 10, 8], rotation: Rotation.ZERO, shape: boxShape(2, 12, 8, 2) };
    const expected = frameRows(6, [
      "    *************   ",
      "    *************   ",
      "    ****@@@@@****   ",
      "    ****@@@@@****   ",
      "    ****@@@@@****   ",
      "    ****-----****   ",
      "    ****-----****   ",
      "    ****-----****   ",
      "    *************   ",
    ]);

    const world = new World(20, 20, 20);
    expect(flat.render(world, [box, mesh]).rows).toEqual(expected);
    expect(flat.render(world, [mesh, box]).rows).toEqual(expected);
  });

  test("an empty frame renders nothing", () => {
    const world = slabWorld();
    const result = flat.render(new World(0, 6, 10), world.placements());
    expect(result.output).toBe("");
    expect(result.rows).toEqual([]);
    expect(result.metrics.rays).toBe(0);
    expect(result.metrics.placementsSkipped).toBe(1);
  });

  test("an empty world renders blanks", () => {
    const result = flat.render(new World(3, 2, 4), []);
    expect(result.output).toBe("   \n   ");
    expect(result.metrics.cellsFilled).toBe(0);
  });

  test("row bands produce the same frame and totals", () => {
    const world = slabWorld();
    const single = flat.render(world, world.placements());
    const banded = new ForwardRenderer({ xScale: 1, bands: 4 }).render(world, world.placements());
    expect(banded.rows).toEqual(single.rows);
    expect(banded.metrics.traversal).toEqual(single.metrics.traversal);
  });

  test("honours lighting and ramp settings", () => {
    const world = slabWorld();
    const frontLit = new ForwardRenderer({ xScale: 1, lightDirection: [0, 0, 1] });
    expect(frontLit.render(world, world.placements()).rows[2]).toBe("  @@@@  ");

    const custom = new ForwardRenderer({ xScale: 1, ramp: "ab", levels: 2, blank: "." });
    expect(custom.render(world, world.placements()).rows).toEqual([
      "........",
      "........",
      "..bbbb..",
      "..bbbb..",
      "........",
      "........",
    ]);
  });

  test("validates its configuration", () => {
    expect(() => new ForwardRenderer({ ramp: "" })).toThrow("Shading ramp must not be empty");
    expect(() => new ForwardRenderer({ blank: "" })).toThrow("Blank marker must be a single character");
    expect(() => new ForwardRenderer({ levels: 0 })).toThrow("Shading levels must be a positive integer");
    expect(() => new ForwardRenderer({ xScale: 1.5 })).toThrow("xScale must be a positive integer");
    expect(() => new ForwardRenderer({ bands: 0 })).toThrow("bands must be a positive integer");
    expect(() => new ForwardRenderer({ ambient: 1.5 })).toThrow("Ambient light must be within [0, 1]");
    expect(() => new ForwardRenderer({ lightDirection: [0, 0, 0] })).toThrow(
      "Light direction must be a finite, non-zero vector"
    );
  });
});

describe("splitBands", () => {
  test("covers every row once", () => {
    expect(splitBands(10, 3)).toEqual([
      { start: 0, end: 4 },
      { start: 4, end: 8 },
      { start: 8, end: 10 },
    ]);
  });

  test("never returns empty bands", () => {
    expect(splitBands(2, 5)).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 2 },
    ]);
    expect(splitBands(0, 2)).toEqual([]);
  });
});
