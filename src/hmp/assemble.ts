/**
 * Quad mesh assembly
 *
 * Every grid cell becomes one quad with its own copy of its four corner
 * vertices, wound (x,y) (x,y+1) (x+1,y+1) (x+1,y). Face f owns vertex slots
 * 4f..4f+3.
 */

import type { Logger } from "../logger";
import type { HmpMesh } from "../scene/types";
import type { VertexGrid } from "./vertices";

export const VERTICES_PER_FACE = 4;

/**
 * Texture coordinates for every grid vertex, row-major uv pairs.
 * Steps are 1/n + 1/n^2 per cell in each direction.
 */
export function generateTextureCoords(width: number, height: number): Float32Array {
  const uvs = new Float32Array(width * height * 2);
  if (width === 0 || height === 0) return uvs;

  const stepX = 1 / width + 1 / width / width;
  const stepY = 1 / height + 1 / height / height;

  let i = 0;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      uvs[i * 2] = stepX * x;
      uvs[i * 2 + 1] = stepY * y;
      i++;
    }
  }
  return uvs;
}

function copyAttribute(
  src: Float32Array,
  srcIndex: number,
  dst: Float32Array,
  dstIndex: number,
  size: number
): void {
  for (let c = 0; c < size; c++) {
    dst[dstIndex * size + c] = src[srcIndex * size + c]!;
  }
}

/**
 * Build the quad face list from a decoded grid.
 *
 * `uvs`, when given, holds one uv pair per grid vertex. A cell whose corners
 * are not all present in the grid still gets its face and four indices, but
 * its vertex slots are left zeroed.
 */
export function assembleQuadMesh(
  grid: VertexGrid,
  uvs: Float32Array | null,
  logger: Logger
): HmpMesh {
  const { width, height } = grid;
  const faceCount = width > 1 && height > 1 ? (width - 1) * (height - 1) : 0;
  const vertexCount = faceCount * VERTICES_PER_FACE;
  const available = grid.positions.length / 3;

  const vertices = new Float32Array(vertexCount * 3);
  const normals = new Float32Array(vertexCount * 3);
  const outUVs = uvs ? new Float32Array(vertexCount * 2) : null;
  const faces = new Uint32Array(vertexCount);

  let face = 0;
  let degenerate = 0;
  for (let y = 0; y < height - 1; y++) {
    const row0 = y * width;
    const row1 = (y + 1) * width;
    for (let x = 0; x < width - 1; x++, face++) {
      const base = face * VERTICES_PER_FACE;
      for (let k = 0; k < VERTICES_PER_FACE; k++) {
        faces[base + k] = base + k;
      }

      const corners = [row0 + x, row1 + x, row1 + x + 1, row0 + x + 1];
      if (row1 + x + 1 >= available) {
        degenerate++;
        continue;
      }

      for (let k = 0; k < VERTICES_PER_FACE; k++) {
        const src = corners[k]!;
        copyAttribute(grid.positions, src, vertices, base + k, 3);
        copyAttribute(grid.normals, src, normals, base + k, 3);
        if (uvs && outUVs) {
          copyAttribute(uvs, src, outUVs, base + k, 2);
        }
      }
    }
  }

  if (degenerate > 0) {
    logger.warn(`${degenerate} of ${faceCount} faces reach past the vertex grid and were left empty`);
  }

  return {
    vertices,
    normals,
    uvs: outUVs,
    faces,
    faceCount,
    vertexCount,
    materialIndex: 0,
  };
}
