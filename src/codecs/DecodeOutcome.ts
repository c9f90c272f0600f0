/**
 * Result of decoding one chunk: either a value, or the chunk's own bytes
 * when it was too short to hold one.
 */
export type DecodeOutcome<T> =
  | { kind: 'decoded'; value: T }
  | { kind: 'undecoded'; bytes: Uint8Array };

/** Values decoded from a byte sequence, plus how many trailing bytes were left over. */
export interface BatchResult<T> {
  /** Decoded values, in input order. */
  decoded: T[];
  /** Total length of all undecoded chunks. */
  remainingByteCount: number;
}

/** Batch decode that only succeeds when no bytes are left over. */
export type ExactBatchResult<T> =
  | { kind: 'all-decoded'; values: T[] }
  | { kind: 'incomplete'; remainingByteCount: number };

export function decoded<T>(value: T): DecodeOutcome<T> {
  return { kind: 'decoded', value };
}

export function undecoded<T>(bytes: Uint8Array): DecodeOutcome<T> {
  return { kind: 'undecoded', bytes };
}

export function isDecoded<T>(
  outcome: DecodeOutcome<T>
): outcome is Extract<DecodeOutcome<T>, { kind: 'decoded' }> {
  return outcome.kind === 'decoded';
}

export function isUndecoded<T>(
  outcome: DecodeOutcome<T>
): outcome is Extract<DecodeOutcome<T>, { kind: 'undecoded' }> {
  return outcome.kind === 'undecoded';
}

/**
 * Fold per-chunk outcomes into a BatchResult. Every undecoded chunk counts
 * toward `remainingByteCount`, not only a trailing one.
 */
export function partitionOutcomes<T>(outcomes: readonly DecodeOutcome<T>[]): BatchResult<T> {
  const result: BatchResult<T> = { decoded: [], remainingByteCount: 0 };
  for (const outcome of outcomes) {
    if (outcome.kind === 'decoded') {
      result.decoded.push(outcome.value);
    } else {
      result.remainingByteCount += outcome.bytes.length;
    }
  }
  return result;
}

/** Collapse a BatchResult: all-decoded when nothing is left over, else incomplete. */
export function toExactBatchResult<T>(batch: BatchResult<T>): ExactBatchResult<T> {
  if (batch.remainingByteCount === 0) {
    return { kind: 'all-decoded', values: batch.decoded };
  }
  return { kind: 'incomplete', remainingByteCount: batch.remainingByteCount };
}
