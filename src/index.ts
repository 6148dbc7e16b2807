/**
 * hmp-terrain - decoder for 3D GameStudio HMP heightmap terrain files
 */

export const VERSION = "0.0.1";

export { decodeHmp, canDecode, HMP_IMPORTER_INFO, MIN_FILE_SIZE } from "./hmp/decodeHmp";
export { detectRevision, type HmpRevision } from "./hmp/magic";
export { HEADER_SIZE, type HmpHeader } from "./hmp/header";
export {
  DEFAULT_MATERIAL_NAME,
  type Color3,
  type HmpMaterial,
  type HmpTexture,
  type ShadingModel,
} from "./hmp/material";
export type { PixelFormat } from "./hmp/texture";
export type { HmpMesh, HmpScene, SceneFlags, SceneNode } from "./scene/types";
export { HmpDecodeError, isHmpDecodeError, type HmpErrorKind } from "./errors";
export { createConsoleLogger, silentLogger, type Logger } from "./logger";
export { DEFAULT_DECODE_OPTIONS, type HmpDecodeOptions } from "./config";
export * as geometry from "./geometry";
