/**
 * Command-line options and scene setup for the demo entry point.
 */

import { config } from "./config";
import { AABB } from "./geometry/aabb";
import { loadOBJ } from "./geometry/obj";
import { TriangleMesh } from "./geometry/triangle";
import { Rotation } from "./math/rotation";
import type { Vec3 } from "./math/vec3";
import { cube, pyramid, tetrahedron } from "./scene/models/primitives";
import { terrain } from "./scene/models/terrain";
import { primitives } from "./scene/sdf";
import { boxShape, meshShape, sdfShape } from "./scene/shapes";
import type { Shape } from "./scene/types";
import { randomTriangles, seededRandom } from "./scene/utils";
import { World } from "./scene/world";
import { unwrap } from "./utils/result";

export const SHAPES = ["cube", "tetrahedron", "pyramid", "terrain", "box", "sphere", "torus", "soup"] as const;
export type ShapeName = (typeof SHAPES)[number];

export interface CliArgs {
  width: number;
  height: number;
  depth: number;
  shape: ShapeName;
  obj: string | null;
  size: number;
  xScale: number;
  ambient: number;
  /** Degrees. */
  rotation: Vec3;
  seed: number;
  frames: number | null;
  fps: number;
  animate: boolean;
  interactive: boolean;
  metrics: boolean;
  help: boolean;
}

export const USAGE = `Usage: tsx src/main.ts [options]

Renders a shaded shape into the terminal.

Options:
  -w, --width <int>      World width in cells (default: ${config.world.width})
  -h, --height <int>     World height in cells (default: ${config.world.height})
  -d, --depth <int>      World depth (default: ${config.world.depth})
  -s, --shape <name>     ${SHAPES.join(" | ")} (default: cube)
  --obj <path>           Load a Wavefront OBJ mesh instead of --shape
  --size <float>         Shape size in cells (default: ${config.scene.size})
  --yaw/--pitch/--roll <deg>  Starting rotation (default: ${config.scene.rotation.join("/")})
  --seed <int>           Seed for terrain and soup (default: ${config.scene.seed})
  -x, --x-scale <int>    Characters per cell horizontally (default: ${config.render.xScale})
  --ambient <float>      Ambient light in [0, 1] (default: ${config.lighting.ambient})
  -a, --animate          Spin the shape
  -i, --interactive      Rotate with the keyboard
  --frames <int>         Stop the animation after this many frames
  --fps <int>            Frames per second (default: ${config.animation.fps})
  -m, --metrics          Print render and traversal metrics
  --help                 Show this help`;

function intArg(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n)) {
    throw new Error(`${flag} expects an integer, got ${value ?? "nothing"}`);
  }
  return n;
}

function floatArg(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isFinite(n)) {
    throw new Error(`${flag} expects a number, got ${value ?? "nothing"}`);
  }
  return n;
}

function isShapeName(value: string): value is ShapeName {
  return SHAPES.some((s) => s === value);
}

export function parseArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = {
    width: config.world.width,
    height: config.world.height,
    depth: config.world.depth,
    shape: "cube",
    obj: null,
    size: config.scene.size,
    xScale: config.render.xScale,
    ambient: config.lighting.ambient,
    rotation: [...config.scene.rotation],
    seed: config.scene.seed,
    frames: null,
    fps: config.animation.fps,
    animate: false,
    interactive: false,
    metrics: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-w":
      case "--width":
        result.width = intArg(arg, args[++i]);
        break;
      case "-h":
      case "--height":
        result.height = intArg(arg, args[++i]);
        break;
      case "-d":
      case "--depth":
        result.depth = intArg(arg, args[++i]);
        break;
      case "-s":
      case "--shape": {
        const name = args[++i] ?? "";
        if (!isShapeName(name)) {
          throw new Error(`Unknown shape "${name}"; expected one of ${SHAPES.join(", ")}`);
        }
        result.shape = name;
        break;
      }
      case "--obj":
        result.obj = args[++i] ?? null;
        if (result.obj === null) throw new Error("--obj expects a path");
        break;
      case "--size":
        result.size = floatArg(arg, args[++i]);
        break;
      case "--yaw":
        result.rotation[0] = floatArg(arg, args[++i]);
        break;
      case "--pitch":
        result.rotation[1] = floatArg(arg, args[++i]);
        break;
      case "--roll":
        result.rotation[2] = floatArg(arg, args[++i]);
        break;
      case "--seed":
        result.seed = intArg(arg, args[++i]);
        break;
      case "-x":
      case "--x-scale":
        result.xScale = intArg(arg, args[++i]);
        break;
      case "--ambient":
        result.ambient = floatArg(arg, args[++i]);
        break;
      case "-a":
      case "--animate":
        result.animate = true;
        break;
      case "-i":
      case "--interactive":
        result.interactive = true;
        break;
      case "--frames":
        result.frames = intArg(arg, args[++i]);
        break;
      case "--fps":
        result.fps = intArg(arg, args[++i]);
        if (result.fps < 1) throw new Error("--fps must be at least 1");
        break;
      case "-m":
      case "--metrics":
        result.metrics = true;
        break;
      case "--help":
        result.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return result;
}

// =============================================================================
// Scene Setup
// =============================================================================

export function createShape(name: ShapeName, id: number, size: number, seed: number): Shape {
  const r = size / 2;
  switch (name) {
    case "cube":
      return meshShape(cube(id, size));
    case "tetrahedron":
      return meshShape(tetrahedron(id, r));
    case "pyramid":
      return meshShape(pyramid(id, size, size));
    case "terrain":
      return meshShape(
        terrain(id, { cols: 24, rows: 24, seed, amplitude: size / 6 }).fitToSize(size)
      );
    case "box":
      return boxShape(id, size, size * 0.6, size * 0.4);
    case "sphere":
      return sdfShape(id, primitives.sphere(r), new AABB([-r, -r, -r], [r, r, r]));
    case "torus": {
      const major = size * 0.35;
      const minor = size * 0.15;
      const reach = major + minor;
      return sdfShape(id, primitives.torus(major, minor), new AABB([-reach, -minor, -reach], [reach, minor, reach]));
    }
    case "soup": {
      const rng = seededRandom(seed);
      return meshShape(new TriangleMesh(id, randomTriangles(rng, 60, r * 0.7, size / 6)));
    }
    default: {
      const unreachable: never = name;
      return unreachable;
    }
  }
}

export function toRadians(degrees: Vec3): Rotation {
  const k = Math.PI / 180;
  return new Rotation(degrees[0] * k, degrees[1] * k, degrees[2] * k);
}

/** World with one shape centred in it. */
export async function buildWorld(args: CliArgs): Promise<World> {
  const id = config.scene.shapeId;
  const shape = args.obj
    ? meshShape(unwrap(await loadOBJ(args.obj, id)).fitToSize(args.size))
    : createShape(args.shape, id, args.size, args.seed);
  const center: Vec3 = [Math.floor(args.width / 2), Math.floor(args.height / 2), Math.floor(args.depth / 2)];
  return new World(args.width, args.height, args.depth).add(shape, center, toRadians(args.rotation));
}
