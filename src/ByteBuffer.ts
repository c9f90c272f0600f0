import type { Codec } from './codecs/Codec';
import { bytesToHex } from './hex';

/**
 * Byte buffer with a cursor, for reading or writing a run of fixed-width
 * values one at a time (for instance a length prefix followed by a body).
 * Reads past the end return undefined and leave the cursor where it was.
 */
export class ByteBuffer {
  private _data: Uint8Array;
  private _length: number;
  private _offset: number;

  private constructor(data: Uint8Array, length: number, offset: number) {
    this._data = data;
    this._length = length;
    this._offset = offset;
  }

  /** Empty buffer for writing; grows past `initialCapacity` as needed. */
  static alloc(initialCapacity = 256): ByteBuffer {
    return new ByteBuffer(new Uint8Array(initialCapacity), 0, 0);
  }

  /** Wrap a copy of existing bytes for reading. */
  static from(data: Uint8Array): ByteBuffer {
    return new ByteBuffer(new Uint8Array(data), data.length, 0);
  }

  /** Number of valid bytes. */
  get length(): number {
    return this._length;
  }

  /** Current cursor position in bytes. */
  get offset(): number {
    return this._offset;
  }

  /** Bytes from cursor to end. */
  get remaining(): number {
    return this._length - this._offset;
  }

  /** Write raw bytes at the cursor. */
  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(this._offset + bytes.length);
    this._data.set(bytes, this._offset);
    this._offset += bytes.length;
    if (this._offset > this._length) {
      this._length = this._offset;
    }
  }

  /** Encode `value` with `codec` and write it at the cursor. */
  write<T>(codec: Codec<T>, value: T): void {
    this.writeBytes(codec.encode(value));
  }

  /**
   * Read a copy of the next `count` bytes, or undefined if fewer remain or
   * `count` is not a non-negative integer.
   */
  readBytes(count: number): Uint8Array | undefined {
    if (!Number.isInteger(count) || count < 0 || count > this.remaining) return undefined;
    const bytes = this._data.slice(this._offset, this._offset + count);
    this._offset += count;
    return bytes;
  }

  /** Decode the next value with `codec`, or undefined if too few bytes remain. */
  read<T>(codec: Codec<T>): T | undefined {
    const value = codec.decode(this._data.subarray(this._offset, this._length));
    if (value === undefined) return undefined;
    this._offset += codec.byteLength;
    return value;
  }

  /** Return a compact copy of the valid bytes. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, this._length);
  }

  /** Return space-separated hex of the valid bytes. */
  toHex(): string {
    return bytesToHex(this.toUint8Array());
  }

  /** Move the cursor back to the first byte. */
  reset(): void {
    this._offset = 0;
  }

  /** Seek to absolute byte offset. */
  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this._length) {
      throw new RangeError(`ByteBuffer: seek offset ${offset} out of range [0, ${this._length}]`);
    }
    this._offset = offset;
  }

  private ensureCapacity(bytesNeeded: number): void {
    if (bytesNeeded <= this._data.length) return;
    let newSize = Math.max(this._data.length, 1);
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data);
    this._data = newData;
  }
}
