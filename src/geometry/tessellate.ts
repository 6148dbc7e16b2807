/**
 * Quad tessellation using earcut
 */

import earcut from "earcut";
import type { HmpMesh } from "../scene/types";
import type { IndexArray } from "./types";

/** Fallback split for quads earcut cannot cut (zero-area faces) */
const FAN = [0, 1, 2, 0, 2, 3];

/**
 * Split every quad face of a mesh into two triangles.
 *
 * Each quad is triangulated on its XY footprint, which is where a heightmap
 * cell is guaranteed to be a simple polygon.
 */
export function triangulateQuads(mesh: HmpMesh): IndexArray {
  const out =
    mesh.vertexCount > 65535
      ? new Uint32Array(mesh.faceCount * 6)
      : new Uint16Array(mesh.faceCount * 6);

  // Flatten coordinates for earcut
  const coords = new Array<number>(8);

  for (let f = 0; f < mesh.faceCount; f++) {
    for (let k = 0; k < 4; k++) {
      const v = mesh.faces[f * 4 + k]!;
      coords[k * 2] = mesh.vertices[v * 3]!;
      coords[k * 2 + 1] = mesh.vertices[v * 3 + 1]!;
    }

    let local = earcut(coords, undefined, 2);
    if (local.length !== 6) {
      local = FAN;
    }

    for (let i = 0; i < 6; i++) {
      out[f * 6 + i] = mesh.faces[f * 4 + local[i]!]!;
    }
  }

  return out;
}
