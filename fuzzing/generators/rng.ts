/**
 * Seeded generators for property tests over the codec.
 * The same seed always yields the same sequence, so a failure can be replayed.
 */

import { U16, U32, U64 } from '../../src/UintWidth';

export class Rng {
  private state: number;

  constructor(seed: number) {
    // an all-zero state is a fixed point of xorshift
    this.state = seed | 0 || 0x9e3779b9;
  }

  /** Returns an unsigned 32-bit integer. */
  uint32(): number {
    // xorshift32
    this.state ^= this.state << 13;
    this.state ^= this.state >>> 17;
    this.state ^= this.state << 5;
    return this.state >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    return this.uint32() / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns `count` random bytes. */
  bytes(count: number): Uint8Array {
    const result = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      result[i] = this.uint32() & 0xff;
    }
    return result;
  }

  /** Returns a random 64-bit unsigned integer. */
  uint64(): bigint {
    return (BigInt(this.uint32()) << 32n) | BigInt(this.uint32());
  }
}

// Boundary values (0, 1, max) come up about one draw in ten.

export function randomUint16(rng: Rng): number {
  return rng.int(0, 9) === 0 ? rng.pick([0, 1, U16.max]) : rng.uint32() & 0xffff;
}

export function randomUint32(rng: Rng): number {
  return rng.int(0, 9) === 0 ? rng.pick([0, 1, U32.max]) : rng.uint32();
}

export function randomUint64(rng: Rng): bigint {
  return rng.int(0, 9) === 0 ? rng.pick([0n, 1n, U64.max]) : rng.uint64();
}

/** Byte length of a random input around a width: k whole values plus a tail of r bytes. */
export function randomLayout(
  rng: Rng, width: { byteLength: number }, maxValues = 16
): { whole: number; tail: number } {
  return { whole: rng.int(0, maxValues), tail: rng.int(0, width.byteLength - 1) };
}
