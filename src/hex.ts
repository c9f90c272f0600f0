const HEX_DIGITS = '0123456789ABCDEF';

/** Two uppercase hex digits for the low 8 bits of `byte`. */
export function byteToHex(byte: number): string {
  return HEX_DIGITS[(byte >> 4) & 0x0f] + HEX_DIGITS[byte & 0x0f];
}

/** Space-separated hex, e.g. [0x00, 0xff] -> "00 FF". */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, b => byteToHex(b)).join(' ');
}

/**
 * Parse hex text back into bytes. Case-insensitive; whitespace may separate
 * byte pairs but not split one, so "00 FF" and "00ff" are accepted and
 * "0 0FF" is not.
 */
export function hexToBytes(text: string): Uint8Array {
  const groups = text.split(/\s+/).filter(group => group.length > 0);
  for (const group of groups) {
    if (!/^[0-9a-fA-F]*$/.test(group)) {
      throw new Error(`hexToBytes: invalid hex character in '${text}'`);
    }
    if (group.length % 2 !== 0) {
      throw new Error(`hexToBytes: group '${group}' splits a byte pair`);
    }
  }
  const digits = groups.join('');
  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(digits.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
