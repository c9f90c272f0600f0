import * as os from 'os';
import { BYTE_ORDERS, hostByteOrder, oppositeByteOrder } from '../src/ByteOrder';

describe('ByteOrder', () => {
  it('lists both orders', () => {
    expect(BYTE_ORDERS).toEqual(['little-endian', 'big-endian']);
  });

  it('swaps to the opposite order', () => {
    expect(oppositeByteOrder('little-endian')).toBe('big-endian');
    expect(oppositeByteOrder('big-endian')).toBe('little-endian');
  });

  describe('hostByteOrder', () => {
    it('matches the platform endianness', () => {
      const expected = os.endianness() === 'LE' ? 'little-endian' : 'big-endian';
      expect(hostByteOrder()).toBe(expected);
    });

    it('returns the same answer on every call', () => {
      expect(hostByteOrder()).toBe(hostByteOrder());
    });
  });
});
