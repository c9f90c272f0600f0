/**
 * Property tests for the fixed-width codecs.
 *
 * Each property runs FUZZ_ITERATIONS times against seeded random input,
 * for every width and both byte orders.
 */

import { BYTE_ORDERS } from '../src/ByteOrder';
import { U16, U32, U64, type UintWidth } from '../src/UintWidth';
import { chunkBytes, concatBytes } from '../src/chunk';
import { UintCodec } from '../src/codecs/UintCodec';
import { UintSequenceCodec } from '../src/codecs/UintSequenceCodec';
import { Rng, randomLayout, randomUint16, randomUint32, randomUint64 } from './generators/rng';

const FUZZ_ITERATIONS = Number(process.env.FUZZ_ITERATIONS) || 500;

function fuzzWidth<T extends number | bigint>(
  width: UintWidth<T>, randomValue: (rng: Rng) => T, seed: number
): void {
  const W = width.byteLength;

  describe(width.name, () => {
    for (const order of BYTE_ORDERS) {
      describe(order, () => {
        const codec = new UintCodec(width, order);
        const sequence = new UintSequenceCodec({ itemCodec: codec });

        it('decode(encode(v)) returns v', () => {
          const rng = new Rng(seed);
          for (let i = 0; i < FUZZ_ITERATIONS; i++) {
            const value = randomValue(rng);
            const bytes = codec.encode(value);
            expect(bytes).toHaveLength(W);
            expect(codec.decode(bytes)).toBe(value);
          }
        });

        it('returns undefined for any input shorter than one value', () => {
          const rng = new Rng(seed + 1);
          for (let i = 0; i < FUZZ_ITERATIONS; i++) {
            expect(codec.decode(rng.bytes(rng.int(0, W - 1)))).toBeUndefined();
          }
        });

        it('accounts for whole values and the ragged tail', () => {
          const rng = new Rng(seed + 2);
          for (let i = 0; i < FUZZ_ITERATIONS; i++) {
            const { whole, tail } = randomLayout(rng, width);
            const bytes = rng.bytes(whole * W + tail);

            const result = sequence.decode(bytes);
            expect(result.decoded).toHaveLength(whole);
            expect(result.remainingByteCount).toBe(tail);
            for (let k = 0; k < whole; k++) {
              expect(result.decoded[k]).toBe(codec.decode(bytes.subarray(k * W)));
            }

            const exact = sequence.decodeExact(bytes);
            if (tail === 0) {
              expect(exact).toEqual({ kind: 'all-decoded', values: result.decoded });
            } else {
              expect(exact).toEqual({ kind: 'incomplete', remainingByteCount: tail });
            }
          }
        });

        it('decodes what the batch encoder produced', () => {
          const rng = new Rng(seed + 3);
          for (let i = 0; i < FUZZ_ITERATIONS; i++) {
            const values = Array.from({ length: rng.int(0, 8) }, () => randomValue(rng));
            expect(sequence.decodeExact(sequence.encodeFlat(values))).toEqual({
              kind: 'all-decoded',
              values,
            });
          }
        });
      });
    }

    it('little-endian bytes reversed equal big-endian bytes', () => {
      const le = new UintCodec(width, 'little-endian');
      const be = new UintCodec(width, 'big-endian');
      const rng = new Rng(seed + 4);
      for (let i = 0; i < FUZZ_ITERATIONS; i++) {
        const value = randomValue(rng);
        expect(le.encode(value).reverse()).toEqual(be.encode(value));
      }
    });

    it('chunks reassemble to the original input', () => {
      const rng = new Rng(seed + 5);
      for (let i = 0; i < FUZZ_ITERATIONS; i++) {
        const bytes = rng.bytes(rng.int(0, 64));
        const chunks = chunkBytes(bytes, W);
        expect(chunks).toHaveLength(Math.ceil(bytes.length / W));
        for (const chunk of chunks.slice(0, -1)) {
          expect(chunk).toHaveLength(W);
        }
        expect(concatBytes(chunks)).toEqual(bytes);
      }
    });
  });
}

describe('fuzz: fixed-width codecs', () => {
  fuzzWidth(U16, randomUint16, 0x1601);
  fuzzWidth(U32, randomUint32, 0x3202);
  fuzzWidth(U64, randomUint64, 0x6403);
});
