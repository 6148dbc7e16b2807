import { describe, it, expect } from "vitest";
import { silentLogger } from "../logger";
import { assembleQuadMesh } from "../hmp/assemble";
import type { VertexGrid } from "../hmp/vertices";
import type { HmpMesh } from "../scene/types";
import { triangulateQuads } from "./tessellate";

function flatMesh(width: number, height: number): HmpMesh {
  const count = width * height;
  const grid: VertexGrid = {
    width,
    height,
    positions: new Float32Array(count * 3),
    normals: new Float32Array(count * 3),
  };
  for (let i = 0; i < count; i++) {
    grid.positions[i * 3] = i % width;
    grid.positions[i * 3 + 1] = Math.floor(i / width);
  }
  return assembleQuadMesh(grid, null, silentLogger);
}

describe("triangulateQuads", () => {
  it("splits every quad into two triangles", () => {
    const mesh = flatMesh(4, 3);
    const indices = triangulateQuads(mesh);

    expect(indices).toHaveLength(6 * mesh.faceCount);
    expect(indices).toBeInstanceOf(Uint16Array);
  });

  it("only references the face's own vertices", () => {
    const mesh = flatMesh(3, 3);
    const indices = triangulateQuads(mesh);

    for (let f = 0; f < mesh.faceCount; f++) {
      const used = new Set(Array.from(indices.subarray(f * 6, f * 6 + 6)));
      expect([...used].sort((a, b) => a - b)).toEqual([f * 4, f * 4 + 1, f * 4 + 2, f * 4 + 3]);
    }
  });

  it("falls back to a fan for zero-area faces", () => {
    const mesh = flatMesh(2, 2);
    mesh.vertices.fill(0);

    expect(Array.from(triangulateQuads(mesh))).toEqual([0, 1, 2, 0, 2, 3]);
  });

  it("returns an empty buffer for a mesh without faces", () => {
    expect(triangulateQuads(flatMesh(1, 4))).toHaveLength(0);
  });
});
