import { describe, it, expect, vi } from "vitest";
import { BinaryCursor } from "../io/BinaryCursor";
import { isHmpDecodeError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { vertexB, vertexC } from "../testing/hmpBuilder";
import type { HmpHeader } from "./header";
import { NORMAL_TABLE, NORMAL_TABLE_SIZE } from "./normals";
import { VERTEX_FORMATS, decodeVertexGrid, heightFromQuantized } from "./vertices";

function header(triSpacingX: number, triSpacingY: number): HmpHeader {
  return {
    version: 5,
    scale: [1, 1, 1],
    scaleOrigin: [0, 0, 0],
    boundingRadius: 0,
    triSpacingX,
    triSpacingY,
    fnumvertsX: 2,
    numSkins: 0,
    numVerts: 4,
    numTris: 0,
    numFrames: 1,
    numStVerts: 0,
    flags: 0,
    size: 0,
  };
}

function records(parts: Uint8Array[]): BinaryCursor {
  const out = new Uint8Array(parts.length * 4);
  parts.forEach((p, i) => out.set(p, i * 4));
  return new BinaryCursor(out);
}

describe("heightFromQuantized", () => {
  it("maps the midpoint to just below zero", () => {
    expect(heightFromQuantized(32767, 2)).toBeCloseTo(-0.000122, 6);
  });

  it("spans +-4 triangle widths", () => {
    expect(heightFromQuantized(0, 2)).toBe(-8);
    expect(heightFromQuantized(0xffff, 2)).toBe(8);
  });
});

describe("normal table", () => {
  it("has 162 unit vectors", () => {
    expect(NORMAL_TABLE_SIZE).toBe(162);
    for (const [x, y, z] of NORMAL_TABLE) {
      expect(Math.hypot(x, y, z)).toBeCloseTo(1, 4);
    }
  });
});

describe("decodeVertexGrid", () => {
  it("places revision B vertices on the grid", () => {
    const cursor = records(Array.from({ length: 6 }, () => vertexB(32767, 5)));
    const grid = decodeVertexGrid(
      cursor,
      header(2, 2),
      { width: 3, height: 2 },
      VERTEX_FORMATS.B,
      silentLogger
    );

    expect(grid.width).toBe(3);
    expect(grid.height).toBe(2);
    for (let i = 0; i < 6; i++) {
      expect(grid.positions[i * 3]).toBe((i % 3) * 2);
      expect(grid.positions[i * 3 + 1]).toBe(Math.floor(i / 3) * 2);
      expect(grid.positions[i * 3 + 2]).toBeCloseTo(-0.000122, 6);
      // Table entry 5 points straight up
      expect(Array.from(grid.normals.subarray(i * 3, i * 3 + 3))).toEqual([0, 0, 1]);
    }
    expect(cursor.offset).toBe(24);
  });

  it("clamps revision B normal indices past the table and warns", () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const cursor = records([vertexB(0, 200)]);
    const grid = decodeVertexGrid(cursor, header(1, 1), { width: 1, height: 1 }, VERTEX_FORMATS.B, logger);
    const last = NORMAL_TABLE[NORMAL_TABLE_SIZE - 1]!;

    expect(grid.normals[0]).toBeCloseTo(last[0], 6);
    expect(grid.normals[1]).toBeCloseTo(last[1], 6);
    expect(grid.normals[2]).toBeCloseTo(last[2], 6);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("renormalizes revision C normals", () => {
    const cursor = records([vertexC(0xffff, 64, 0), vertexC(0, -128, 0)]);
    const grid = decodeVertexGrid(cursor, header(1, 3), { width: 2, height: 1 }, VERTEX_FORMATS.C, silentLogger);

    // (0.5, 0, 1) normalized
    expect(grid.normals[0]).toBeCloseTo(0.4472136, 6);
    expect(grid.normals[1]).toBe(0);
    expect(grid.normals[2]).toBeCloseTo(0.8944272, 6);
    // (-1, 0, 1) normalized
    expect(grid.normals[3]).toBeCloseTo(-Math.SQRT1_2, 6);
    expect(grid.normals[5]).toBeCloseTo(Math.SQRT1_2, 6);
    expect(grid.positions[2]).toBe(4);
    expect(grid.positions[5]).toBe(-4);
  });

  it("checks the whole payload before reading", () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const cursor = records([vertexB(0, 200), vertexB(0, 200), vertexB(0, 200)]);

    let caught: unknown;
    try {
      decodeVertexGrid(cursor, header(1, 1), { width: 2, height: 2 }, VERTEX_FORMATS.B, logger);
    } catch (err) {
      caught = err;
    }
    expect(isHmpDecodeError(caught, "TruncatedInput")).toBe(true);
    expect(cursor.offset).toBe(0);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("uses 4-byte records for both revisions", () => {
    expect(VERTEX_FORMATS.B.recordSize).toBe(4);
    expect(VERTEX_FORMATS.C.recordSize).toBe(4);
  });
});
