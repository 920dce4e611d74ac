/**
 * Wavefront OBJ loader. Reads `v` and `f` records; everything else (normals,
 * texture coordinates, groups, materials) is ignored.
 */

import { readFile } from "node:fs/promises";
import type { Vec3 } from "../math/vec3";
import { Err, Ok, type Result } from "../utils/result";
import { Triangle, TriangleMesh } from "./triangle";

export class ObjParseError extends Error {
  constructor(
    message: string,
    /** 1-based source line, or null for whole-file problems. */
    readonly line: number | null = null
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

const INDEX_PATTERN = /^-?\d+$/;

/** Resolves a 1-based or negative (relative to the end) OBJ index to 0-based. */
function resolveIndex(token: string, vertexCount: number, line: number): Result<number, ObjParseError> {
  const raw = token.split("/")[0] ?? "";
  if (!INDEX_PATTERN.test(raw)) {
    return Err(new ObjParseError(`Invalid face index on line ${line}: ${token}`, line));
  }
  const index = Number(raw);
  if (index === 0) {
    return Err(new ObjParseError(`Invalid vertex index 0 on line ${line}`, line));
  }
  const resolved = index > 0 ? index - 1 : vertexCount + index;
  if (resolved < 0 || resolved >= vertexCount) {
    return Err(new ObjParseError(`Vertex index out of range on line ${line}`, line));
  }
  return Ok(resolved);
}

export function parseOBJ(text: string, id: number = 1): Result<TriangleMesh, ObjParseError> {
  const vertices: Vec3[] = [];
  const triangles: Triangle[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const trimmed = lines[i]!.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    const [keyword, ...args] = trimmed.split(/\s+/);

    switch (keyword) {
      case "v": {
        const coords = args.slice(0, 3).map(Number);
        if (coords.length < 3 || !coords.every(Number.isFinite)) {
          return Err(new ObjParseError(`Invalid vertex coordinates on line ${lineNumber}: ${trimmed}`, lineNumber));
        }
        vertices.push([coords[0]!, coords[1]!, coords[2]!]);
        break;
      }

      case "f": {
        const indices: number[] = [];
        for (const token of args) {
          const index = resolveIndex(token, vertices.length, lineNumber);
          if (!index.ok) return index;
          indices.push(index.value);
        }
        if (indices.length < 3) {
          return Err(new ObjParseError(`Face has fewer than 3 vertices on line ${lineNumber}`, lineNumber));
        }
        // Fan triangulation; fine for the convex polygons OBJ exporters write
        const v0 = vertices[indices[0]!]!;
        for (let k = 1; k < indices.length - 1; k++) {
          triangles.push(new Triangle(v0, vertices[indices[k]!]!, vertices[indices[k + 1]!]!));
        }
        break;
      }

      default:
        break;
    }
  }

  if (vertices.length === 0) {
    return Err(new ObjParseError("No vertices found in OBJ file"));
  }
  if (triangles.length === 0) {
    return Err(new ObjParseError("No faces found in OBJ file"));
  }
  return Ok(new TriangleMesh(id, triangles));
}

/** Reads and parses a file. I/O failures reject; parse failures resolve to `Err`. */
export async function loadOBJ(path: string, id: number = 1): Promise<Result<TriangleMesh, ObjParseError>> {
  const text = await readFile(path, "utf8");
  return parseOBJ(text, id);
}
