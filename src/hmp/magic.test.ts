import { describe, it, expect } from "vitest";
import { detectRevision, printableMagic } from "./magic";

function ascii(text: string): Uint8Array {
  return new Uint8Array(Array.from(text, (c) => c.charCodeAt(0)));
}

describe("detectRevision", () => {
  it.each([
    ["HMP4", "A"],
    ["4PMH", "A"],
    ["HMP5", "B"],
    ["5PMH", "B"],
    ["HMP7", "C"],
    ["7PMH", "C"],
  ])("recognizes %s as revision %s", (magic, revision) => {
    expect(detectRevision(ascii(magic + "rest"))).toBe(revision);
  });

  it("returns null for other tokens", () => {
    expect(detectRevision(ascii("HMP6"))).toBeNull();
    expect(detectRevision(ascii("MDL7"))).toBeNull();
    expect(detectRevision(ascii("hmp5"))).toBeNull();
  });

  it("returns null for buffers shorter than the token", () => {
    expect(detectRevision(ascii("HMP"))).toBeNull();
  });
});

describe("printableMagic", () => {
  it("keeps printable ASCII", () => {
    expect(printableMagic(ascii("ABCD"))).toBe("ABCD");
  });

  it("replaces other bytes with '?'", () => {
    expect(printableMagic(new Uint8Array([0x48, 0x00, 0x50, 0xff]))).toBe("H?P?");
  });
});
