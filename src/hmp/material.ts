/**
 * Terrain materials
 */

import type { PixelFormat } from "./texture";

export type Color3 = [number, number, number];

export type ShadingModel = "gouraud" | "phong";

export const DEFAULT_MATERIAL_NAME = "DefaultMaterial";

/** Name given to the material built from the first embedded skin */
export const SKIN_MATERIAL_NAME = "Skin0";

/** Texture attached to a material as its diffuse map */
export type HmpTexture =
  | {
      kind: "pixels";
      format: PixelFormat;
      width: number;
      height: number;
      /** Base level decoded to RGBA8, row-major */
      rgba: Uint8Array;
    }
  | {
      kind: "embedded";
      /** Compressed image file as stored in the skin */
      data: Uint8Array;
      /** File type guessed from the data ("dds", "png", ...), or "" */
      formatHint: string;
    }
  | {
      kind: "external";
      /** File name referenced by the skin */
      path: string;
    };

export interface HmpMaterial {
  name: string;
  shadingModel: ShadingModel;
  diffuse: Color3;
  specular: Color3;
  ambient: Color3;
  emissive: Color3;
  /** Specular exponent, 0 when the file has none */
  shininess: number;
  opacity: number;
  texture: HmpTexture | null;
}

const DEFAULT_DIFFUSE = 0.6;
const DEFAULT_AMBIENT = 0.05;

/** Flat gray Gouraud material used when a file has no skins */
export function createDefaultMaterial(name = DEFAULT_MATERIAL_NAME): HmpMaterial {
  return {
    name,
    shadingModel: "gouraud",
    diffuse: [DEFAULT_DIFFUSE, DEFAULT_DIFFUSE, DEFAULT_DIFFUSE],
    specular: [DEFAULT_DIFFUSE, DEFAULT_DIFFUSE, DEFAULT_DIFFUSE],
    ambient: [DEFAULT_AMBIENT, DEFAULT_AMBIENT, DEFAULT_AMBIENT],
    emissive: [0, 0, 0],
    shininess: 0,
    opacity: 1,
    texture: null,
  };
}
