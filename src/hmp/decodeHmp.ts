/**
 * HMP decoder
 *
 * Entry point: sniff the revision, then run the shared pipeline
 * header -> skins -> vertex grid -> quad mesh. Decoding either returns a
 * complete scene or throws an HmpDecodeError.
 */

import { resolveDecodeOptions, type HmpDecodeOptions, type ResolvedDecodeOptions } from "../config";
import { HmpDecodeError } from "../errors";
import { BinaryCursor } from "../io/BinaryCursor";
import { TERRAIN_ROOT_NAME, type HmpScene } from "../scene/types";
import { assembleQuadMesh, generateTextureCoords } from "./assemble";
import { checkHeaderSize, gridSize, readHeader, validateHeader } from "./header";
import { REVISION_NAMES, detectRevision, printableMagic } from "./magic";
import { createDefaultMaterial } from "./material";
import { readSkins } from "./skin";
import { VERTEX_FORMATS, VERTEX_PAYLOAD_GAP, decodeVertexGrid, type VertexFormat } from "./vertices";

/** Smallest buffer worth looking at */
export const MIN_FILE_SIZE = 50;

export const HMP_IMPORTER_INFO = {
  name: "3D GameStudio Heightmap (HMP) Importer",
  extensions: ["hmp"],
  binary: true,
} as const;

function toBytes(input: Uint8Array | ArrayBuffer): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

/** True if the buffer starts with a known HMP magic token, supported or not */
export function canDecode(input: Uint8Array | ArrayBuffer): boolean {
  return detectRevision(toBytes(input)) !== null;
}

/** Decode an HMP file held fully in memory. */
export function decodeHmp(
  input: Uint8Array | ArrayBuffer,
  options?: HmpDecodeOptions
): HmpScene {
  const opts = resolveDecodeOptions(options);
  const bytes = toBytes(input);

  if (bytes.length < MIN_FILE_SIZE) {
    throw new HmpDecodeError(
      "OpenOrSizeError",
      `HMP file is too small (${bytes.length} bytes, need at least ${MIN_FILE_SIZE})`
    );
  }

  const revision = detectRevision(bytes);
  if (revision === null) {
    throw new HmpDecodeError(
      "UnrecognizedSubformat",
      `Unknown HMP subformat. Magic word (${printableMagic(bytes)}) is not known`
    );
  }

  opts.logger.debug(`subtype: ${REVISION_NAMES[revision]}`);

  if (revision === "A") {
    throw new HmpDecodeError("UnsupportedRevision", "HMP4 is currently not supported");
  }

  const format = VERTEX_FORMATS[revision];
  return decodeTerrain(new BinaryCursor(bytes), format, opts);
}

function decodeTerrain(
  cursor: BinaryCursor,
  format: VertexFormat,
  opts: ResolvedDecodeOptions
): HmpScene {
  checkHeaderSize(cursor.length);
  const header = readHeader(cursor);
  validateHeader(header);
  const size = gridSize(header);

  const hasSkins = header.numSkins > 0;
  const material = hasSkins
    ? readSkins(cursor, header.numSkins, opts)
    : createDefaultMaterial();

  cursor.skip(VERTEX_PAYLOAD_GAP, "frame header");
  const grid = decodeVertexGrid(cursor, header, size, format, opts.logger);

  const uvs = hasSkins && opts.generateUVs ? generateTextureCoords(size.width, size.height) : null;
  const mesh = assembleQuadMesh(grid, uvs, opts.logger);

  return {
    revision: format.revision,
    meshes: [mesh],
    materials: [material],
    rootNode: { name: TERRAIN_ROOT_NAME, meshes: [0], children: [] },
    flags: { terrain: true },
  };
}
