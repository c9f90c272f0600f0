/**
 * Split `bytes` into consecutive copies of `width` bytes each.
 * The last chunk holds the `length % width` leftover bytes when that is nonzero.
 * Empty input yields no chunks.
 */
export function chunkBytes(bytes: Uint8Array, width: number): Uint8Array[] {
  if (!Number.isInteger(width) || width <= 0) {
    throw new RangeError(`chunkBytes: width must be a positive integer, got ${width}`);
  }
  const chunks: Uint8Array[] = [];
  for (let start = 0; start < bytes.length; start += width) {
    chunks.push(bytes.slice(start, start + width));
  }
  return chunks;
}

/** Concatenate byte sequences into one fresh array. */
export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}
