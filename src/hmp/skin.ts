/**
 * Skin chunks
 *
 * Each skin is a 12-byte header (type, width, height) followed by a payload
 * whose shape depends on the type word (see ./texture). Only the first skin
 * of a file is turned into a material; the others are measured and skipped.
 * Reading and skipping share measureSkinPayload so both always move the
 * cursor by the same amount.
 */

import { BinaryCursor } from "../io/BinaryCursor";
import { HmpDecodeError } from "../errors";
import type { Logger } from "../logger";
import {
  SKIN_MATERIAL_NAME,
  createDefaultMaterial,
  type Color3,
  type HmpMaterial,
  type HmpTexture,
} from "./material";
import {
  SKIN_FLAG_ASCII_DEF,
  SKIN_FLAG_MATERIAL,
  SKIN_FLAG_MIPMAPS,
  SKIN_IMAGE_KIND,
  SKIN_KIND_MASK,
  baseImageSize,
  decodePixels,
  mipChainSize,
  pixelFormatOf,
  sniffImageFormat,
  type PixelFormat,
} from "./texture";

/** Size of a skin header: type, width, height */
export const SKIN_HEADER_SIZE = 12;

/** Four RGBA float colours and a float power */
export const SKIN_MATERIAL_BLOCK_SIZE = 68;

export interface SkinHeader {
  type: number;
  width: number;
  height: number;
}

/** What a skin payload holds and how many bytes each part takes */
export interface SkinLayout {
  image:
    | { kind: "pixels"; format: PixelFormat; bytes: number; mipBytes: number }
    | { kind: "embedded"; bytes: number }
    | { kind: "external"; bytes: number }
    | { kind: "none" };
  materialBytes: number;
  asciiDefBytes: number;
  /** Whole payload after the skin header */
  totalBytes: number;
}

export interface SkinReadOptions {
  logger: Logger;
  palette: Uint8Array;
}

/** Read type, width and height of a skin. */
export function readSkinHeader(cursor: BinaryCursor): SkinHeader {
  cursor.ensure(SKIN_HEADER_SIZE, "skin header");
  return { type: cursor.u32(), width: cursor.u32(), height: cursor.u32() };
}

/**
 * Read the header of a file's first skin. Some writers put an extra 12-byte
 * record in front of it whose type word is 0; that record is stepped over.
 */
export function readFirstSkinHeader(cursor: BinaryCursor): SkinHeader {
  let type = cursor.u32();
  if (type === 0) {
    cursor.skip(8, "skin header");
    type = cursor.u32();
    if (type === 0) {
      throw new HmpDecodeError(
        "UnreadableSkinChunk",
        "Unable to read HMP skin chunk: type is zero",
        cursor.offset - 4
      );
    }
  }
  return { type, width: cursor.u32(), height: cursor.u32() };
}

/**
 * Work out the layout of the payload at the cursor without moving it.
 * Fails if any part of the payload runs past the end of the buffer.
 */
export function measureSkinPayload(header: SkinHeader, cursor: BinaryCursor): SkinLayout {
  const probe = cursor.fork();
  const start = probe.offset;
  const kind = header.type & SKIN_KIND_MASK;

  let image: SkinLayout["image"];
  if (kind === SKIN_IMAGE_KIND.embedded) {
    image = { kind: "embedded", bytes: header.width };
  } else if (kind === SKIN_IMAGE_KIND.external) {
    image = { kind: "external", bytes: header.width };
  } else {
    const format = pixelFormatOf(kind);
    if (!format) {
      throw new HmpDecodeError(
        "UnreadableSkinChunk",
        `Unknown skin image type ${kind} (type word 0x${header.type.toString(16)})`,
        start
      );
    }
    if (header.width === 0 || header.height === 0) {
      image = { kind: "none" };
    } else {
      image = {
        kind: "pixels",
        format,
        bytes: baseImageSize(format, header.width, header.height),
        mipBytes:
          header.type & SKIN_FLAG_MIPMAPS ? mipChainSize(format, header.width, header.height) : 0,
      };
    }
  }

  if (image.kind === "pixels") {
    probe.skip(image.bytes + image.mipBytes, "skin image");
  } else if (image.kind !== "none") {
    probe.skip(image.bytes, "skin image");
  }

  let materialBytes = 0;
  if (header.type & SKIN_FLAG_MATERIAL) {
    materialBytes = SKIN_MATERIAL_BLOCK_SIZE;
    probe.skip(materialBytes, "skin material");
  }

  let asciiDefBytes = 0;
  if (header.type & SKIN_FLAG_ASCII_DEF) {
    const len = probe.i32();
    if (len < 0) {
      throw new HmpDecodeError(
        "UnreadableSkinChunk",
        `Skin effect definition has negative length ${len}`,
        probe.offset - 4
      );
    }
    probe.skip(len, "skin effect definition");
    asciiDefBytes = 4 + len;
  }

  return { image, materialBytes, asciiDefBytes, totalBytes: probe.offset - start };
}

function readColor(cursor: BinaryCursor): { rgb: Color3; alpha: number } {
  const rgb: Color3 = [cursor.f32(), cursor.f32(), cursor.f32()];
  return { rgb, alpha: cursor.f32() };
}

/** Read one skin payload into a material. The cursor ends after the payload. */
export function readSkin(
  cursor: BinaryCursor,
  header: SkinHeader,
  options: SkinReadOptions
): HmpMaterial {
  const layout = measureSkinPayload(header, cursor);
  const material = createDefaultMaterial(SKIN_MATERIAL_NAME);

  let texture: HmpTexture | null = null;
  const image = layout.image;
  switch (image.kind) {
    case "pixels": {
      const data = cursor.readBytes(image.bytes, "skin image");
      cursor.skip(image.mipBytes, "skin mip levels");
      texture = {
        kind: "pixels",
        format: image.format,
        width: header.width,
        height: header.height,
        rgba: decodePixels(image.format, header.width, header.height, data, options.palette),
      };
      break;
    }
    case "embedded": {
      const data = cursor.readBytes(image.bytes, "embedded skin image");
      texture = { kind: "embedded", data, formatHint: sniffImageFormat(data) };
      break;
    }
    case "external":
      texture = { kind: "external", path: cursor.fixedString(image.bytes, "texture file name") };
      break;
    case "none":
      if ((header.type & SKIN_KIND_MASK) !== 0) {
        options.logger.warn(
          `Skin refers to an embedded texture, but its width or height is zero (${header.width}x${header.height})`
        );
      }
      break;
  }
  material.texture = texture;

  if (layout.materialBytes > 0) {
    const diffuse = readColor(cursor);
    material.diffuse = diffuse.rgb;
    material.opacity = diffuse.alpha;
    material.ambient = readColor(cursor).rgb;
    material.specular = readColor(cursor).rgb;
    material.emissive = readColor(cursor).rgb;
    material.shininess = cursor.f32();
    material.shadingModel = material.shininess > 0 ? "phong" : "gouraud";
  }

  if (layout.asciiDefBytes > 0) {
    cursor.skip(layout.asciiDefBytes, "skin effect definition");
  }

  return material;
}

/** Step over one skin payload without decoding it */
export function skipSkin(cursor: BinaryCursor, header: SkinHeader): void {
  const layout = measureSkinPayload(header, cursor);
  cursor.skip(layout.totalBytes, "skin");
}

/**
 * Read the skin section: the first skin becomes the material and the
 * remaining `numSkins - 1` are skipped. The cursor ends after the last skin.
 */
export function readSkins(
  cursor: BinaryCursor,
  numSkins: number,
  options: SkinReadOptions
): HmpMaterial {
  const material = readSkin(cursor, readFirstSkinHeader(cursor), options);

  for (let i = 1; i < numSkins; i++) {
    cursor.ensure(SKIN_HEADER_SIZE, `header of skin ${i}`);
    const header = readSkinHeader(cursor);
    skipSkin(cursor, header);
    cursor.ensure(0, `skin ${i}`);
  }

  return material;
}
