/**
 * Geometry utilities for rendering decoded terrain
 */

export * from "./types";
export { triangulateQuads } from "./tessellate";
export { buildTerrainMeshData, TERRAIN_VERTEX_STRIDE } from "./terrainMesh";
