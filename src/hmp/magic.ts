/**
 * HMP magic token detection
 *
 * The first four bytes name the revision. Writers disagree on byte order,
 * so both "HMP5" and "5PMH" are accepted.
 */

/** A = HMP4, B = HMP5, C = HMP7 */
export type HmpRevision = "A" | "B" | "C";

const REVISION_TAGS: ReadonlyArray<readonly [string, HmpRevision]> = [
  ["HMP4", "A"],
  ["HMP5", "B"],
  ["HMP7", "C"],
];

/** Human-readable subtype names, as used in diagnostics */
export const REVISION_NAMES: Record<HmpRevision, string> = {
  A: "3D GameStudio A4, magic word is HMP4",
  B: "3D GameStudio A5, magic word is HMP5",
  C: "3D GameStudio A7, magic word is HMP7",
};

function readTag(bytes: Uint8Array): string {
  let tag = "";
  for (let i = 0; i < 4; i++) {
    tag += String.fromCharCode(bytes[i]!);
  }
  return tag;
}

/** Detect the revision from the magic token, or null if it is not an HMP file */
export function detectRevision(bytes: Uint8Array): HmpRevision | null {
  if (bytes.length < 4) return null;

  const tag = readTag(bytes);
  const reversed = tag.split("").reverse().join("");
  for (const [name, revision] of REVISION_TAGS) {
    if (tag === name || reversed === name) return revision;
  }
  return null;
}

/** Magic bytes with anything outside printable ASCII replaced by "?" */
export function printableMagic(bytes: Uint8Array): string {
  let out = "";
  for (let i = 0; i < Math.min(4, bytes.length); i++) {
    const c = bytes[i]!;
    out += c >= 0x20 && c < 0x7f ? String.fromCharCode(c) : "?";
  }
  return out;
}
