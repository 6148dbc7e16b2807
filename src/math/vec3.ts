/**
 * 3D vector utilities for vertex positions and normals
 */

/** 3D vector as [x, y, z] tuple */
export type Vec3 = [number, number, number];

/** Compute the length of a vector */
export function length(v: Vec3): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

/** Normalize a vector */
export function normalize(v: Vec3): Vec3 {
  const len = length(v);
  if (len > 0) {
    return [v[0] / len, v[1] / len, v[2] / len];
  }
  return [0, 0, 0];
}

/** Write a vector into a flat xyz array at vertex `index` */
export function writeTo(out: Float32Array, index: number, v: Vec3): void {
  out[index * 3] = v[0];
  out[index * 3 + 1] = v[1];
  out[index * 3 + 2] = v[2];
}
