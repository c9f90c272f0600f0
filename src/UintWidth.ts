/**
 * Arithmetic a width needs to move bytes in and out of a value.
 * 16- and 32-bit values fit in a number; 64-bit values need a bigint.
 */
export interface UintArithmetic<T extends number | bigint> {
  readonly zero: T;
  /** acc * 256 + byte */
  shiftIn(acc: T, byte: number): T;
  /** value mod 256 */
  lowByte(value: T): number;
  /** floor(value / 256) */
  shiftOut(value: T): T;
}

const numberArithmetic: UintArithmetic<number> = {
  zero: 0,
  shiftIn: (acc, byte) => acc * 256 + byte,
  lowByte: value => value % 256,
  shiftOut: value => Math.floor(value / 256),
};

const bigintArithmetic: UintArithmetic<bigint> = {
  zero: 0n,
  shiftIn: (acc, byte) => (acc << 8n) | BigInt(byte),
  lowByte: value => Number(value & 0xffn),
  shiftOut: value => value >> 8n,
};

export type UintWidthName = 'u16' | 'u32' | 'u64';

/** Fixed byte width of an unsigned integer, with the value type it decodes to. */
export interface UintWidth<T extends number | bigint> {
  readonly name: UintWidthName;
  readonly byteLength: 2 | 4 | 8;
  readonly bitLength: 16 | 32 | 64;
  /** Largest representable value (2^bitLength - 1). */
  readonly max: T;
  readonly arithmetic: UintArithmetic<T>;
  /** True for a non-negative integer of the right type that fits in the width. */
  isValue(value: unknown): value is T;
}

export type AnyUintWidth = UintWidth<number> | UintWidth<bigint>;

function numberWidth(
  name: 'u16' | 'u32', byteLength: 2 | 4, bitLength: 16 | 32
): UintWidth<number> {
  const max = 2 ** bitLength - 1;
  return {
    name,
    byteLength,
    bitLength,
    max,
    arithmetic: numberArithmetic,
    isValue: (value: unknown): value is number =>
      typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= max,
  };
}

export const U16: UintWidth<number> = numberWidth('u16', 2, 16);

export const U32: UintWidth<number> = numberWidth('u32', 4, 32);

export const U64: UintWidth<bigint> = {
  name: 'u64',
  byteLength: 8,
  bitLength: 64,
  max: 0xffff_ffff_ffff_ffffn,
  arithmetic: bigintArithmetic,
  isValue: (value: unknown): value is bigint =>
    typeof value === 'bigint' && value >= 0n && value <= 0xffff_ffff_ffff_ffffn,
};

export const UINT_WIDTHS: readonly AnyUintWidth[] = [U16, U32, U64];

/** Look up the width for a byte count of 2, 4 or 8. */
export function uintWidthForByteLength(byteLength: number): AnyUintWidth | undefined {
  return UINT_WIDTHS.find(w => w.byteLength === byteLength);
}
