/**
 * Skin image payloads
 *
 * A skin's type word packs the image kind into its low three bits and
 * flags into the bits above:
 *
 *   0x07  image kind (see SKIN_IMAGE_KIND)
 *   0x08  three mip levels follow the base image
 *   0x10  a material block follows the image
 *   0x20  a length-prefixed ASCII effect definition follows
 */

export const SKIN_FLAG_MIPMAPS = 0x08;
export const SKIN_FLAG_MATERIAL = 0x10;
export const SKIN_FLAG_ASCII_DEF = 0x20;

export const SKIN_KIND_MASK = 0x07;

export type PixelFormat = "palette8" | "rgb565" | "argb4444" | "rgb888" | "argb8888";

/** Image kinds by their value in the low bits of the skin type */
export const SKIN_IMAGE_KIND = {
  palette8: 0,
  rgb565: 2,
  argb4444: 3,
  rgb888: 4,
  argb8888: 5,
  embedded: 6,
  external: 7,
} as const;

export const BYTES_PER_PIXEL: Record<PixelFormat, number> = {
  palette8: 1,
  rgb565: 2,
  argb4444: 2,
  rgb888: 3,
  argb8888: 4,
};

/** Number of extra mip levels stored when SKIN_FLAG_MIPMAPS is set */
export const MIP_LEVELS = 3;

/** Pixel format for an image kind, or null if the kind does not hold raw pixels */
export function pixelFormatOf(kind: number): PixelFormat | null {
  switch (kind) {
    case SKIN_IMAGE_KIND.palette8:
      return "palette8";
    case SKIN_IMAGE_KIND.rgb565:
      return "rgb565";
    case SKIN_IMAGE_KIND.argb4444:
      return "argb4444";
    case SKIN_IMAGE_KIND.rgb888:
      return "rgb888";
    case SKIN_IMAGE_KIND.argb8888:
      return "argb8888";
    default:
      return null;
  }
}

/** Bytes taken by the base image */
export function baseImageSize(format: PixelFormat, width: number, height: number): number {
  return width * height * BYTES_PER_PIXEL[format];
}

/** Bytes taken by the mip levels after the base image */
export function mipChainSize(format: PixelFormat, width: number, height: number): number {
  let total = 0;
  for (let level = 1; level <= MIP_LEVELS; level++) {
    total += (width >>> level) * (height >>> level) * BYTES_PER_PIXEL[format];
  }
  return total;
}

/** Expand a 5- or 6-bit channel to 8 bits */
function expand5(v: number): number {
  return (v << 3) | (v >> 2);
}

function expand6(v: number): number {
  return (v << 2) | (v >> 4);
}

/**
 * Decode a base image into RGBA8.
 *
 * 24- and 32-bit images are stored blue first. 16-bit values are
 * little-endian.
 */
export function decodePixels(
  format: PixelFormat,
  width: number,
  height: number,
  data: Uint8Array,
  palette: Uint8Array
): Uint8Array {
  const count = width * height;
  const rgba = new Uint8Array(count * 4);

  for (let i = 0; i < count; i++) {
    const o = i * 4;
    switch (format) {
      case "palette8": {
        const p = data[i]! * 3;
        rgba[o] = palette[p]!;
        rgba[o + 1] = palette[p + 1]!;
        rgba[o + 2] = palette[p + 2]!;
        rgba[o + 3] = 255;
        break;
      }
      case "rgb565": {
        const v = data[i * 2]! | (data[i * 2 + 1]! << 8);
        rgba[o] = expand5((v >> 11) & 0x1f);
        rgba[o + 1] = expand6((v >> 5) & 0x3f);
        rgba[o + 2] = expand5(v & 0x1f);
        rgba[o + 3] = 255;
        break;
      }
      case "argb4444": {
        const v = data[i * 2]! | (data[i * 2 + 1]! << 8);
        rgba[o] = ((v >> 8) & 0xf) * 17;
        rgba[o + 1] = ((v >> 4) & 0xf) * 17;
        rgba[o + 2] = (v & 0xf) * 17;
        rgba[o + 3] = ((v >> 12) & 0xf) * 17;
        break;
      }
      case "rgb888": {
        const s = i * 3;
        rgba[o] = data[s + 2]!;
        rgba[o + 1] = data[s + 1]!;
        rgba[o + 2] = data[s]!;
        rgba[o + 3] = 255;
        break;
      }
      case "argb8888": {
        const s = i * 4;
        rgba[o] = data[s + 2]!;
        rgba[o + 1] = data[s + 1]!;
        rgba[o + 2] = data[s]!;
        rgba[o + 3] = data[s + 3]!;
        break;
      }
    }
  }

  return rgba;
}

/** Guess the file type of an embedded compressed image from its leading bytes */
export function sniffImageFormat(data: Uint8Array): string {
  if (data.length >= 4 && data[0] === 0x44 && data[1] === 0x44 && data[2] === 0x53 && data[3] === 0x20) {
    return "dds";
  }
  if (data.length >= 4 && data[0] === 0x89 && data[1] === 0x50 && data[2] === 0x4e && data[3] === 0x47) {
    return "png";
  }
  if (data.length >= 2 && data[0] === 0xff && data[1] === 0xd8) {
    return "jpg";
  }
  if (data.length >= 2 && data[0] === 0x42 && data[1] === 0x4d) {
    return "bmp";
  }
  return "";
}
