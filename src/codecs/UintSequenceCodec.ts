import { chunkBytes, concatBytes } from '../chunk';
import type { UintCodec } from './UintCodec';
import {
  partitionOutcomes,
  toExactBatchResult,
  type BatchResult,
  type DecodeOutcome,
  type ExactBatchResult,
} from './DecodeOutcome';

export interface UintSequenceOptions<T extends number | bigint> {
  /** Codec for each element in the sequence. */
  itemCodec: UintCodec<T>;
}

/**
 * Batch codec for a run of same-width unsigned integers with no length
 * prefix or framing. A ragged tail is reported, never thrown.
 */
export class UintSequenceCodec<T extends number | bigint> {
  private readonly itemCodec: UintCodec<T>;

  constructor(options: UintSequenceOptions<T>) {
    this.itemCodec = options.itemCodec;
  }

  /** Encode each value separately, in input order. */
  encode(values: readonly T[]): Uint8Array[] {
    return values.map(value => this.itemCodec.encode(value));
  }

  /** Encode all values into one contiguous byte array. */
  encodeFlat(values: readonly T[]): Uint8Array {
    return concatBytes(this.encode(values));
  }

  /** Per-chunk outcomes; the trailing short chunk, if any, keeps its bytes. */
  decodeOutcomes(bytes: Uint8Array): DecodeOutcome<T>[] {
    return chunkBytes(bytes, this.itemCodec.byteLength).map(chunk => this.itemCodec.decodeChunk(chunk));
  }

  decode(bytes: Uint8Array): BatchResult<T> {
    return partitionOutcomes(this.decodeOutcomes(bytes));
  }

  /** Decode only if `bytes` is a whole number of values; otherwise report the leftover count. */
  decodeExact(bytes: Uint8Array): ExactBatchResult<T> {
    return toExactBatchResult(this.decode(bytes));
  }
}
