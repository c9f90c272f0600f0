export { BYTE_ORDERS, hostByteOrder, oppositeByteOrder } from './ByteOrder';
export type { ByteOrder } from './ByteOrder';
export { U16, U32, U64, UINT_WIDTHS, uintWidthForByteLength } from './UintWidth';
export type {
  AnyUintWidth,
  UintArithmetic,
  UintWidth,
  UintWidthName,
} from './UintWidth';
export { composeUint, decomposeUint } from './helpers';
export { chunkBytes, concatBytes } from './chunk';
export { byteToHex, bytesToHex, hexToBytes } from './hex';
export { ByteBuffer } from './ByteBuffer';
export type { Codec } from './codecs/Codec';
export {
  decoded,
  undecoded,
  isDecoded,
  isUndecoded,
  partitionOutcomes,
  toExactBatchResult,
} from './codecs/DecodeOutcome';
export type { BatchResult, DecodeOutcome, ExactBatchResult } from './codecs/DecodeOutcome';
export { UintCodec } from './codecs/UintCodec';
export { UintSequenceCodec } from './codecs/UintSequenceCodec';
export type { UintSequenceOptions } from './codecs/UintSequenceCodec';
