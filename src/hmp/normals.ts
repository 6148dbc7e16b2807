/**
 * Precomputed normal table
 *
 * Revision B vertices store their normal as an index into this fixed set of
 * 162 unit vectors (the same table Quake-era MD2 models use).
 */

import table from "./normals162.json";
import type { Logger } from "../logger";
import type { Vec3 } from "../math/vec3";

function toVec3(entry: number[], index: number): Vec3 {
  const [x, y, z] = entry;
  if (x === undefined || y === undefined || z === undefined) {
    throw new Error(`Normal table entry ${index} does not have 3 components`);
  }
  return [x, y, z];
}

export const NORMAL_TABLE: readonly Vec3[] = table.map(toVec3);

export const NORMAL_TABLE_SIZE = NORMAL_TABLE.length;

/**
 * Look up a table normal. Indices past the end of the table are clamped to
 * the last entry and reported as a warning.
 */
export function lookupNormal(index: number, logger: Logger): Vec3 {
  let i = index;
  if (i >= NORMAL_TABLE_SIZE) {
    logger.warn(`Index overflow in normal vector table (${index} >= ${NORMAL_TABLE_SIZE})`);
    i = NORMAL_TABLE_SIZE - 1;
  }
  const normal = NORMAL_TABLE[i];
  if (!normal) {
    throw new Error(`Normal table has no entry ${i}`);
  }
  return normal;
}
