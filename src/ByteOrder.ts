import * as os from 'os';

/**
 * How the bytes of a multi-byte integer are sequenced.
 *   little-endian: byte 0 is least significant
 *   big-endian:    byte 0 is most significant
 */
export type ByteOrder = 'little-endian' | 'big-endian';

export const BYTE_ORDERS: readonly ByteOrder[] = ['little-endian', 'big-endian'];

export function oppositeByteOrder(order: ByteOrder): ByteOrder {
  return order === 'little-endian' ? 'big-endian' : 'little-endian';
}

let hostOrder: ByteOrder | undefined;

/**
 * Native byte order of the executing machine, as reported by the platform.
 * The platform is asked once; later calls return the cached answer.
 */
export function hostByteOrder(): ByteOrder {
  if (hostOrder === undefined) {
    hostOrder = os.endianness() === 'LE' ? 'little-endian' : 'big-endian';
  }
  return hostOrder;
}
