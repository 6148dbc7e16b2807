/**
 * Geometry output types
 */

/** Triangle index buffer (Uint16 for small meshes, Uint32 for large) */
export type IndexArray = Uint16Array | Uint32Array;

/** Terrain mesh packed for a GPU vertex buffer */
export interface TerrainMeshData {
  /** Vertex buffer: [x, y, z, u, v] per vertex (5 floats) */
  vertices: Float32Array;
  /** Triangle indices */
  indices: IndexArray;
  /** Lowest vertex z */
  minHeight: number;
  /** Highest vertex z */
  maxHeight: number;
}
