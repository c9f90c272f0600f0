import type { ByteOrder } from './ByteOrder';
import type { UintWidth } from './UintWidth';

/**
 * Compose the first `width.byteLength` bytes into one unsigned integer.
 *   little-endian: value = sum(b[i] << 8i)
 *   big-endian:    value = sum(b[i] << 8(W-1-i))
 *
 * No length check: the caller guarantees `bytes` holds at least W bytes.
 * On shorter input the result is unspecified.
 */
export function composeUint<T extends number | bigint>(
  bytes: Uint8Array, width: UintWidth<T>, order: ByteOrder
): T {
  const { byteLength, arithmetic } = width;
  let result = arithmetic.zero;
  // Accumulate most significant byte first.
  if (order === 'big-endian') {
    for (let i = 0; i < byteLength; i++) {
      result = arithmetic.shiftIn(result, bytes[i]);
    }
  } else {
    for (let i = byteLength - 1; i >= 0; i--) {
      result = arithmetic.shiftIn(result, bytes[i]);
    }
  }
  return result;
}

/**
 * Split an unsigned integer into exactly `width.byteLength` fresh bytes.
 * The caller guarantees `value` is in range for the width.
 */
export function decomposeUint<T extends number | bigint>(
  value: T, width: UintWidth<T>, order: ByteOrder
): Uint8Array {
  const { byteLength, arithmetic } = width;
  const bytes = new Uint8Array(byteLength);
  let rest = value;
  for (let i = 0; i < byteLength; i++) {
    const index = order === 'little-endian' ? i : byteLength - 1 - i;
    bytes[index] = arithmetic.lowByte(rest);
    rest = arithmetic.shiftOut(rest);
  }
  return bytes;
}
