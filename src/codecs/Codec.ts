/**
 * Base interface for fixed-width codecs.
 * @template T The TypeScript type this codec encodes/decodes.
 */
export interface Codec<T> {
  /** Number of bytes one encoded value occupies. */
  readonly byteLength: number;

  /** Encode a value into a fresh byte array. Throws if the value is out of range. */
  encode(value: T): Uint8Array;

  /**
   * Decode a value from the front of `bytes`.
   * Returns undefined when fewer than `byteLength` bytes are available.
   */
  decode(bytes: Uint8Array): T | undefined;
}
