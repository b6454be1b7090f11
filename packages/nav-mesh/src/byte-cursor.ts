/**
 * Bounds-checked sequential reader over an immutable byte buffer.
 *
 * Every read is little-endian, advances the cursor by exactly the width it
 * consumed, and throws UnexpectedEofError instead of reading a partial value.
 */

import { Vector3 } from '@navkit/core';
import { CorruptCountError, UnexpectedEofError } from './errors.js';

/** Anything the cursor can wrap. Views keep their own offset and length. */
export type ByteSource = ArrayBuffer | ArrayBufferView;

/** Width in bytes of the integer that prefixes a count. */
export type CountWidth = 1 | 2 | 4;

export class ByteCursor {
  private readonly view: DataView;
  private readonly bytes: Uint8Array;
  private offset = 0;
  readonly byteLength: number;

  constructor(source: ByteSource) {
    if (source instanceof ArrayBuffer) {
      this.view = new DataView(source);
      this.bytes = new Uint8Array(source);
    } else {
      this.view = new DataView(source.buffer, source.byteOffset, source.byteLength);
      this.bytes = new Uint8Array(source.buffer, source.byteOffset, source.byteLength);
    }
    this.byteLength = this.view.byteLength;
  }

  /* ------------------------------------------------------------------ */
  /*  Cursor state                                                       */
  /* ------------------------------------------------------------------ */

  /** Current read position. */
  get position(): number {
    return this.offset;
  }

  /** Bytes left between the cursor and the end of the buffer. */
  get remaining(): number {
    return this.byteLength - this.offset;
  }

  /** Skip forward by `count` bytes. */
  skip(count: number, what = 'skipped bytes'): void {
    this.require(count, what);
    this.offset += count;
  }

  /* ------------------------------------------------------------------ */
  /*  Primitive readers (all little-endian)                              */
  /* ------------------------------------------------------------------ */

  readUint8(what = 'u8'): number {
    this.require(1, what);
    const val = this.view.getUint8(this.offset);
    this.offset += 1;
    return val;
  }

  readInt8(what = 'i8'): number {
    this.require(1, what);
    const val = this.view.getInt8(this.offset);
    this.offset += 1;
    return val;
  }

  readUint16(what = 'u16'): number {
    this.require(2, what);
    const val = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return val;
  }

  readInt16(what = 'i16'): number {
    this.require(2, what);
    const val = this.view.getInt16(this.offset, true);
    this.offset += 2;
    return val;
  }

  readUint32(what = 'u32'): number {
    this.require(4, what);
    const val = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return val;
  }

  readInt32(what = 'i32'): number {
    this.require(4, what);
    const val = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return val;
  }

  readUint64(what = 'u64'): bigint {
    this.require(8, what);
    const val = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    return val;
  }

  readInt64(what = 'i64'): bigint {
    this.require(8, what);
    const val = this.view.getBigInt64(this.offset, true);
    this.offset += 8;
    return val;
  }

  readFloat32(what = 'f32'): number {
    this.require(4, what);
    const val = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return val;
  }

  readFloat64(what = 'f64'): number {
    this.require(8, what);
    const val = this.view.getFloat64(this.offset, true);
    this.offset += 8;
    return val;
  }

  /** One byte, non-zero is true. */
  readBool(what = 'bool'): boolean {
    return this.readUint8(what) !== 0;
  }

  /** Three consecutive float32 values. */
  readVector3(what = 'vector'): Vector3 {
    this.require(12, what);
    const x = this.view.getFloat32(this.offset, true);
    const y = this.view.getFloat32(this.offset + 4, true);
    const z = this.view.getFloat32(this.offset + 8, true);
    this.offset += 12;
    return new Vector3(x, y, z);
  }

  /** Read `count` bytes and return a copy. */
  readBytes(count: number, what = 'bytes'): Uint8Array {
    this.require(count, what);
    const copy = this.bytes.slice(this.offset, this.offset + count);
    this.offset += count;
    return copy;
  }

  /**
   * Read a uint16-length-prefixed string (no terminator counted by the
   * reader). Source writes the C string's NUL inside the length, so one
   * trailing NUL is dropped.
   */
  readString(what = 'string'): string {
    const len = this.readUint16(`${what} length`);
    this.require(len, what);
    let end = this.offset + len;
    if (len > 0 && this.bytes[end - 1] === 0) end--;
    const text = new TextDecoder('utf-8').decode(this.bytes.subarray(this.offset, end));
    this.offset += len;
    return text;
  }

  /* ------------------------------------------------------------------ */
  /*  Counts                                                             */
  /* ------------------------------------------------------------------ */

  /**
   * Read a count prefix and check it before anything is allocated for it.
   *
   * A count above `max` is corrupt. A count whose elements (at least
   * `minElementSize` bytes each) cannot fit in the rest of the buffer means
   * the buffer was cut short.
   */
  readCount(width: CountWidth, what: string, max: number, minElementSize: number): number {
    const at = this.offset;
    const count =
      width === 1 ? this.readUint8(`${what} count`)
      : width === 2 ? this.readUint16(`${what} count`)
      : this.readUint32(`${what} count`);

    if (count > max) {
      throw new CorruptCountError(what, count, `at most ${max}`, at);
    }
    const needed = count * minElementSize;
    if (needed > this.remaining) {
      throw new UnexpectedEofError(needed, this.remaining, this.offset, `${count} ${what}`);
    }
    return count;
  }

  private require(count: number, what: string): void {
    if (count > this.remaining) {
      throw new UnexpectedEofError(count, this.remaining, this.offset, what);
    }
  }
}
