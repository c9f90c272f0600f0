import { hostByteOrder, type ByteOrder } from '../ByteOrder';
import type { UintWidth } from '../UintWidth';
import { composeUint, decomposeUint } from '../helpers';
import { Codec } from './Codec';
import { decoded, undecoded, type DecodeOutcome } from './DecodeOutcome';

/**
 * Fixed-width unsigned integer codec.
 * One class serves all three widths; the width descriptor fixes both the
 * byte count and the value type (number for u16/u32, bigint for u64).
 *
 * @example
 *   const codec = new UintCodec(U16, 'little-endian');
 *   codec.encode(0x1234);                       // [0x34, 0x12]
 *   codec.decode(new Uint8Array([0x34, 0x12])); // 0x1234
 */
export class UintCodec<T extends number | bigint> implements Codec<T> {
  readonly width: UintWidth<T>;
  readonly byteOrder: ByteOrder;

  constructor(width: UintWidth<T>, byteOrder: ByteOrder) {
    this.width = width;
    this.byteOrder = byteOrder;
  }

  /** Codec using the executing machine's native byte order. */
  static native<T extends number | bigint>(width: UintWidth<T>): UintCodec<T> {
    return new UintCodec(width, hostByteOrder());
  }

  get byteLength(): number {
    return this.width.byteLength;
  }

  encode(value: T): Uint8Array {
    if (!this.width.isValue(value)) {
      throw new RangeError(
        `UintCodec(${this.width.name}): value ${String(value)} out of range [0, ${String(this.width.max)}]`
      );
    }
    return decomposeUint(value, this.width, this.byteOrder);
  }

  decode(bytes: Uint8Array): T | undefined {
    if (bytes.length < this.width.byteLength) return undefined;
    return this.decodeUnchecked(bytes);
  }

  /**
   * Decode without a length check. `bytes` must hold at least `byteLength`
   * bytes; shorter input gives an unspecified result.
   * @internal
   */
  decodeUnchecked(bytes: Uint8Array): T {
    return composeUint(bytes, this.width, this.byteOrder);
  }

  /**
   * Decode one chunk. A chunk of exactly `byteLength` bytes decodes; any
   * other chunk comes back as a copy of its bytes.
   */
  decodeChunk(chunk: Uint8Array): DecodeOutcome<T> {
    if (chunk.length !== this.width.byteLength) {
      return undecoded(chunk.slice());
    }
    return decoded(this.decodeUnchecked(chunk));
  }
}
