/**
 * HMP header (revisions A, B and C share this layout)
 *
 * Fixed 84-byte record, little-endian:
 *
 *   0  ident[4]        36 triSpacingX    56 numTris
 *   4  version         40 triSpacingY    60 numFrames
 *   8  scale[3]        44 fnumvertsX     64 numStVerts
 *  20  scaleOrigin[3]  48 numSkins       68 flags
 *  32  boundingRadius  52 numVerts       72 size
 *
 * Skins follow at byte 84. The header is only considered complete once the
 * file reaches byte 120, where the vertex payload of a skinless file starts.
 */

import type { BinaryCursor } from "../io/BinaryCursor";
import { HmpDecodeError } from "../errors";
import type { Vec3 } from "../math/vec3";

/** Offset of the first skin chunk */
export const SKIN_SECTION_OFFSET = 84;

/** Minimum file size for a complete header */
export const HEADER_SIZE = 120;

export interface HmpHeader {
  version: number;
  scale: Vec3;
  /** Carried for completeness; vertex decoding does not use it */
  scaleOrigin: Vec3;
  boundingRadius: number;
  /** Spacing between grid vertices in X */
  triSpacingX: number;
  /** Spacing between grid vertices in Y */
  triSpacingY: number;
  /** Grid vertex count in X, stored as a float */
  fnumvertsX: number;
  /** Unsigned; any non-zero count means skins follow the header */
  numSkins: number;
  numVerts: number;
  numTris: number;
  numFrames: number;
  numStVerts: number;
  flags: number;
  size: number;
}

/** Grid dimensions implied by the header */
export interface GridSize {
  width: number;
  height: number;
}

function readVec3(cursor: BinaryCursor): Vec3 {
  return [cursor.f32(), cursor.f32(), cursor.f32()];
}

/** Read the header fields. The cursor is left at the skin section. */
export function readHeader(cursor: BinaryCursor): HmpHeader {
  cursor.seek(4);
  const header: HmpHeader = {
    version: cursor.i32(),
    scale: readVec3(cursor),
    scaleOrigin: readVec3(cursor),
    boundingRadius: cursor.f32(),
    triSpacingX: cursor.f32(),
    triSpacingY: cursor.f32(),
    fnumvertsX: cursor.f32(),
    numSkins: cursor.u32(),
    numVerts: cursor.i32(),
    numTris: cursor.i32(),
    numFrames: cursor.i32(),
    numStVerts: cursor.i32(),
    flags: cursor.i32(),
    size: cursor.f32(),
  };
  cursor.seek(SKIN_SECTION_OFFSET);
  return header;
}

/** numVerts / fnumvertsX evaluated in single precision, as the format's tools do */
function rowsAsFloat(header: HmpHeader): number {
  return Math.fround(Math.fround(header.numVerts) / header.fnumvertsX);
}

function invalid(reason: string): HmpDecodeError {
  return new HmpDecodeError("InvalidHeader", reason);
}

/** Fail unless the file is large enough to hold the whole header. */
export function checkHeaderSize(fileSize: number): void {
  if (fileSize < HEADER_SIZE) {
    throw new HmpDecodeError(
      "OpenOrSizeError",
      `HMP file is too small (header size is ${HEADER_SIZE} bytes, this file has ${fileSize})`
    );
  }
}

/**
 * Check the header for numeric sanity. Each failed check is fatal.
 *
 * Only `numVerts / fnumvertsX >= 1` is checked for the grid; the width and
 * height derived from it need not multiply back to numVerts.
 */
export function validateHeader(header: HmpHeader): void {
  if (!Number.isFinite(header.triSpacingX) || !Number.isFinite(header.triSpacingY)) {
    throw invalid("Size of triangles in either x or y direction is not finite");
  }

  if (header.triSpacingX === 0 || header.triSpacingY === 0) {
    throw invalid("Size of triangles in either x or y direction is zero");
  }

  if (!Number.isFinite(header.fnumvertsX)) {
    throw invalid("Number of triangles in x direction is not finite");
  }

  if (header.fnumvertsX < 1 || rowsAsFloat(header) < 1) {
    throw invalid("Number of triangles in either x or y direction is zero");
  }

  if (header.numFrames < 1) {
    throw invalid("There are no frames. At least one should be there");
  }
}

/** Grid width and height derived from a validated header */
export function gridSize(header: HmpHeader): GridSize {
  return {
    width: Math.floor(header.fnumvertsX),
    height: Math.floor(rowsAsFloat(header)),
  };
}
