/**
 * Byte shuffle filter for fixed-width elements
 *
 * Groups byte 0 of every element, then byte 1, and so on. Trailing bytes that
 * do not form a whole element are copied unchanged.
 */

export function shuffle(bytes: Uint8Array, typeSize: number): Uint8Array {
  if (typeSize <= 1) return bytes.slice();

  const count = Math.floor(bytes.length / typeSize);
  const out = new Uint8Array(bytes.length);
  for (let i = 0; i < count; i++) {
    const base = i * typeSize;
    for (let j = 0; j < typeSize; j++) {
      out[j * count + i] = bytes[base + j];
    }
  }
  out.set(bytes.subarray(count * typeSize), count * typeSize);
  return out;
}

export function unshuffle(bytes: Uint8Array, typeSize: number): Uint8Array {
  if (typeSize <= 1) return bytes.slice();

  const count = Math.floor(bytes.length / typeSize);
  const out = new Uint8Array(bytes.length);
  for (let i = 0; i < count; i++) {
    const base = i * typeSize;
    for (let j = 0; j < typeSize; j++) {
      out[base + j] = bytes[j * count + i];
    }
  }
  out.set(bytes.subarray(count * typeSize), count * typeSize);
  return out;
}
