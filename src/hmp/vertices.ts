/**
 * Vertex grid decoding
 *
 * Revisions B and C store the same row-major grid of 4-byte records and
 * differ only in how a record encodes its normal:
 *
 *   B: uint16 z, uint8 normal table index, uint8 padding
 *   C: uint16 z, int8 normal x, int8 normal y
 */

import type { BinaryCursor } from "../io/BinaryCursor";
import type { Logger } from "../logger";
import { normalize, writeTo, type Vec3 } from "../math/vec3";
import type { GridSize, HmpHeader } from "./header";
import { lookupNormal } from "./normals";

/** Bytes between the skin section and the first vertex record */
export const VERTEX_PAYLOAD_GAP = 36;

/** Decoded vertex grid: xyz positions and unit normals, row-major */
export interface VertexGrid extends GridSize {
  positions: Float32Array;
  normals: Float32Array;
}

export type DecodableRevision = "B" | "C";

/** Per-revision record layout */
export interface VertexFormat {
  revision: DecodableRevision;
  recordSize: number;
  /** Read one record's quantized height and normal, advancing the cursor */
  decodeRecord(cursor: BinaryCursor, logger: Logger): { z: number; normal: Vec3 };
}

export const VERTEX_FORMATS: Record<DecodableRevision, VertexFormat> = {
  B: {
    revision: "B",
    recordSize: 4,
    decodeRecord(cursor, logger) {
      const z = cursor.u16();
      const normal = lookupNormal(cursor.u8(), logger);
      cursor.skip(1);
      return { z, normal };
    },
  },
  C: {
    revision: "C",
    recordSize: 4,
    decodeRecord(cursor) {
      const z = cursor.u16();
      const nx = cursor.i8() / 128;
      const ny = cursor.i8() / 128;
      return { z, normal: normalize([nx, ny, 1]) };
    },
  },
};

/** World-space height of a quantized z value */
export function heightFromQuantized(quantized: number, triSpacingX: number): number {
  return (quantized / 0xffff - 0.5) * triSpacingX * 8;
}

/**
 * Decode the vertex grid at the cursor. The whole payload is bounds-checked
 * before the first record is read.
 */
export function decodeVertexGrid(
  cursor: BinaryCursor,
  header: HmpHeader,
  size: GridSize,
  format: VertexFormat,
  logger: Logger
): VertexGrid {
  const { width, height } = size;
  const count = width * height;
  cursor.ensure(count * format.recordSize, "vertex payload");

  const positions = new Float32Array(count * 3);
  const normals = new Float32Array(count * 3);

  let i = 0;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const record = format.decodeRecord(cursor, logger);
      writeTo(positions, i, [
        x * header.triSpacingX,
        y * header.triSpacingY,
        heightFromQuantized(record.z, header.triSpacingX),
      ]);
      writeTo(normals, i, record.normal);
      i++;
    }
  }

  return { width, height, positions, normals };
}
