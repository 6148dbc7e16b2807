/**
 * Binary Cursor
 *
 * Bounds-checked little-endian reader over a read-only byte buffer.
 * Every read checks the projected extent first and throws TruncatedInput
 * instead of returning partial data.
 */

import { HmpDecodeError } from "../errors";

export class BinaryCursor {
  private readonly view: DataView;
  private readonly bytes: Uint8Array;
  private _offset: number;

  constructor(input: Uint8Array | ArrayBuffer, offset = 0) {
    this.bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
    this.view = new DataView(
      this.bytes.buffer,
      this.bytes.byteOffset,
      this.bytes.byteLength
    );
    this._offset = 0;
    this.seek(offset);
  }

  /** Current read position */
  get offset(): number {
    return this._offset;
  }

  /** Total buffer length in bytes */
  get length(): number {
    return this.bytes.byteLength;
  }

  /** Bytes left after the cursor */
  get remaining(): number {
    return this.length - this._offset;
  }

  /** Fail unless `byteCount` more bytes can be read from the cursor. */
  ensure(byteCount: number, what = "data"): void {
    this.ensureOffset(this._offset + byteCount, what);
  }

  /** Fail unless the absolute position `end` lies within the buffer. */
  ensureOffset(end: number, what = "data"): void {
    if (!Number.isFinite(end) || end > this.length || end < 0) {
      throw new HmpDecodeError(
        "TruncatedInput",
        `Unexpected end of file while reading ${what}: need ${end} bytes, file has ${this.length}`,
        this._offset
      );
    }
  }

  /** Independent cursor over the same bytes, starting at the current position */
  fork(): BinaryCursor {
    return new BinaryCursor(this.bytes, this._offset);
  }

  /** Move to an absolute position */
  seek(position: number): void {
    this.ensureOffset(position, "seek target");
    this._offset = position;
  }

  skip(byteCount: number, what = "skipped data"): void {
    this.ensure(byteCount, what);
    this._offset += byteCount;
  }

  u8(): number {
    this.ensure(1);
    const value = this.view.getUint8(this._offset);
    this._offset += 1;
    return value;
  }

  i8(): number {
    this.ensure(1);
    const value = this.view.getInt8(this._offset);
    this._offset += 1;
    return value;
  }

  u16(): number {
    this.ensure(2);
    const value = this.view.getUint16(this._offset, true);
    this._offset += 2;
    return value;
  }

  i32(): number {
    this.ensure(4);
    const value = this.view.getInt32(this._offset, true);
    this._offset += 4;
    return value;
  }

  u32(): number {
    this.ensure(4);
    const value = this.view.getUint32(this._offset, true);
    this._offset += 4;
    return value;
  }

  f32(): number {
    this.ensure(4);
    const value = this.view.getFloat32(this._offset, true);
    this._offset += 4;
    return value;
  }

  /** Copy the next `byteCount` bytes out of the buffer */
  readBytes(byteCount: number, what = "bytes"): Uint8Array {
    this.ensure(byteCount, what);
    const out = this.bytes.slice(this._offset, this._offset + byteCount);
    this._offset += byteCount;
    return out;
  }

  /**
   * Read a fixed-size Latin-1 string field. The text ends at the first zero
   * byte; the cursor always moves past the whole field.
   */
  fixedString(byteCount: number, what = "string"): string {
    this.ensure(byteCount, what);
    let text = "";
    for (let i = 0; i < byteCount; i++) {
      const c = this.bytes[this._offset + i]!;
      if (c === 0) break;
      text += String.fromCharCode(c);
    }
    this._offset += byteCount;
    return text;
  }
}
