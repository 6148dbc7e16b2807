/**
 * Scene output types
 */

import type { HmpMaterial } from "../hmp/material";
import type { HmpRevision } from "../hmp/magic";

/** Quad mesh with one vertex copy per face corner */
export interface HmpMesh {
  /** xyz per vertex, 4 vertices per face */
  vertices: Float32Array;
  /** Unit normal per vertex, parallel to `vertices` */
  normals: Float32Array;
  /** uv per vertex, or null when the mesh has no texture coordinates */
  uvs: Float32Array | null;
  /** Vertex indices, 4 per face */
  faces: Uint32Array;
  faceCount: number;
  vertexCount: number;
  materialIndex: number;
}

export interface SceneNode {
  name: string;
  /** Indices into HmpScene.meshes */
  meshes: number[];
  children: SceneNode[];
}

export interface SceneFlags {
  /** The scene is a heightmap terrain */
  terrain: boolean;
}

export interface HmpScene {
  revision: HmpRevision;
  meshes: HmpMesh[];
  materials: HmpMaterial[];
  rootNode: SceneNode;
  flags: SceneFlags;
}

export const TERRAIN_ROOT_NAME = "terrain_root";
