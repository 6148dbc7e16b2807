/**
 * Decoder configuration
 */

import { createConsoleLogger, type Logger } from "./logger";

/** Size of an RGB palette for 8-bit skins (256 entries * 3 bytes) */
export const PALETTE_SIZE = 768;

export interface HmpDecodeOptions {
  /** Where diagnostics go (default: console, tagged "HmpDecoder") */
  logger?: Logger;
  /**
   * RGB palette used to expand 8-bit paletted skins, 768 bytes
   * (default: gray ramp, entry i = (i, i, i))
   */
  palette?: Uint8Array;
  /**
   * Generate texture coordinates. Files without skins never get them;
   * set to false to drop them for files that have skins too (default: true)
   */
  generateUVs?: boolean;
}

export interface ResolvedDecodeOptions {
  logger: Logger;
  palette: Uint8Array;
  generateUVs: boolean;
}

function grayRamp(): Uint8Array {
  const palette = new Uint8Array(PALETTE_SIZE);
  for (let i = 0; i < 256; i++) {
    palette[i * 3] = i;
    palette[i * 3 + 1] = i;
    palette[i * 3 + 2] = i;
  }
  return palette;
}

export const DEFAULT_DECODE_OPTIONS: Readonly<ResolvedDecodeOptions> = {
  logger: createConsoleLogger("HmpDecoder"),
  palette: grayRamp(),
  generateUVs: true,
};

/** Merge caller options over the defaults. The default palette is copied. */
export function resolveDecodeOptions(
  options: HmpDecodeOptions = {}
): ResolvedDecodeOptions {
  if (options.palette && options.palette.length !== PALETTE_SIZE) {
    throw new Error(
      `Palette must be ${PALETTE_SIZE} bytes (256 RGB entries), got ${options.palette.length}`
    );
  }
  return {
    logger: options.logger ?? DEFAULT_DECODE_OPTIONS.logger,
    palette: options.palette ?? DEFAULT_DECODE_OPTIONS.palette.slice(),
    generateUVs: options.generateUVs ?? DEFAULT_DECODE_OPTIONS.generateUVs,
  };
}
