import { describe, it, expect } from "vitest";
import { BinaryCursor } from "../io/BinaryCursor";
import { buildHmp } from "../testing/hmpBuilder";
import { HmpDecodeError } from "../errors";
import {
  HEADER_SIZE,
  SKIN_SECTION_OFFSET,
  checkHeaderSize,
  gridSize,
  readHeader,
  validateHeader,
  type HmpHeader,
} from "./header";

function headerOf(fixture: Parameters<typeof buildHmp>[0]): HmpHeader {
  return readHeader(new BinaryCursor(buildHmp({ minSize: HEADER_SIZE, ...fixture })));
}

function validationError(header: HmpHeader): HmpDecodeError | undefined {
  try {
    validateHeader(header);
  } catch (err) {
    if (err instanceof HmpDecodeError) return err;
    throw err;
  }
  return undefined;
}

describe("readHeader", () => {
  it("reads the fixed fields and leaves the cursor at the skin section", () => {
    const cursor = new BinaryCursor(
      buildHmp({
        triSpacingX: 2,
        triSpacingY: 0.5,
        fnumvertsX: 3,
        numVerts: 6,
        numFrames: 2,
        numSkins: 0,
        minSize: HEADER_SIZE,
      })
    );
    const header = readHeader(cursor);

    expect(header.version).toBe(5);
    expect(header.triSpacingX).toBe(2);
    expect(header.triSpacingY).toBe(0.5);
    expect(header.fnumvertsX).toBe(3);
    expect(header.numVerts).toBe(6);
    expect(header.numFrames).toBe(2);
    expect(header.numSkins).toBe(0);
    expect(header.scaleOrigin).toEqual([0, 0, 0]);
    expect(cursor.offset).toBe(SKIN_SECTION_OFFSET);
  });

  it("reads the skin count as unsigned", () => {
    const cursor = new BinaryCursor(buildHmp({ numSkins: -1, minSize: HEADER_SIZE }));

    expect(readHeader(cursor).numSkins).toBe(0xffffffff);
  });
});

describe("checkHeaderSize", () => {
  it("accepts exactly 120 bytes", () => {
    expect(() => checkHeaderSize(120)).not.toThrow();
  });

  it("rejects smaller files with OpenOrSizeError", () => {
    expect(() => checkHeaderSize(119)).toThrow(
      "HMP file is too small (header size is 120 bytes, this file has 119)"
    );
  });
});

describe("validateHeader", () => {
  it("accepts a sane header", () => {
    expect(validationError(headerOf({}))).toBeUndefined();
  });

  it("rejects non-finite triangle spacing", () => {
    const err = validationError(headerOf({ triSpacingY: NaN }));

    expect(err?.kind).toBe("InvalidHeader");
    expect(err?.message).toBe("Size of triangles in either x or y direction is not finite");
  });

  it("rejects zero triangle spacing", () => {
    const err = validationError(headerOf({ triSpacingX: 0 }));

    expect(err?.kind).toBe("InvalidHeader");
    expect(err?.message).toBe("Size of triangles in either x or y direction is zero");
  });

  it("rejects a non-finite vertex count in x", () => {
    const err = validationError(headerOf({ fnumvertsX: Infinity }));

    expect(err?.message).toBe("Number of triangles in x direction is not finite");
  });

  it("rejects fewer than one vertex in x", () => {
    const err = validationError(headerOf({ fnumvertsX: 0.5 }));

    expect(err?.message).toBe("Number of triangles in either x or y direction is zero");
  });

  it("rejects fewer than one row", () => {
    const err = validationError(headerOf({ fnumvertsX: 3, numVerts: 2 }));

    expect(err?.message).toBe("Number of triangles in either x or y direction is zero");
  });

  it("rejects a header without frames", () => {
    const err = validationError(headerOf({ numFrames: 0 }));

    expect(err?.kind).toBe("InvalidHeader");
    expect(err?.message).toBe("There are no frames. At least one should be there");
  });
});

describe("gridSize", () => {
  it("floors both dimensions", () => {
    expect(gridSize(headerOf({ fnumvertsX: 3, numVerts: 7 }))).toEqual({ width: 3, height: 2 });
  });

  it("does not require the grid to factor numVerts exactly", () => {
    const header = headerOf({ fnumvertsX: 2.5, numVerts: 10 });

    expect(validationError(header)).toBeUndefined();
    expect(gridSize(header)).toEqual({ width: 2, height: 4 });
  });
});
