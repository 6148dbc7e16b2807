/**
 * Terrain mesh packing
 *
 * Interleaves a decoded HMP mesh into the [x, y, z, u, v] layout terrain
 * shaders read, with triangle indices.
 */

import type { HmpMesh } from "../scene/types";
import { triangulateQuads } from "./tessellate";
import type { TerrainMeshData } from "./types";

/** Floats per packed vertex */
export const TERRAIN_VERTEX_STRIDE = 5;

/** Build renderable mesh data. Meshes without uvs get (0, 0) everywhere. */
export function buildTerrainMeshData(mesh: HmpMesh): TerrainMeshData {
  const vertices = new Float32Array(mesh.vertexCount * TERRAIN_VERTEX_STRIDE);

  let minZ = Infinity;
  let maxZ = -Infinity;

  for (let i = 0; i < mesh.vertexCount; i++) {
    const z = mesh.vertices[i * 3 + 2]!;
    minZ = Math.min(minZ, z);
    maxZ = Math.max(maxZ, z);

    const idx = i * TERRAIN_VERTEX_STRIDE;
    vertices[idx] = mesh.vertices[i * 3]!;
    vertices[idx + 1] = mesh.vertices[i * 3 + 1]!;
    vertices[idx + 2] = z;
    vertices[idx + 3] = mesh.uvs ? mesh.uvs[i * 2]! : 0; // Texture U
    vertices[idx + 4] = mesh.uvs ? mesh.uvs[i * 2 + 1]! : 0; // Texture V
  }

  return {
    vertices,
    indices: triangulateQuads(mesh),
    // Empty meshes report a flat 0..0 range
    minHeight: mesh.vertexCount > 0 ? minZ : 0,
    maxHeight: mesh.vertexCount > 0 ? maxZ : 0,
  };
}
