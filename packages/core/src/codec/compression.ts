/**
 * Compression primitive backed by native zstd
 */

import * as zstd from "zstd-napi";

/** Level for integer and datetime blocks */
export const INTEGER_LEVEL = 3;
/** Level for floating-point blocks */
export const FLOAT_LEVEL = 1;
/** Level for serialized object columns */
export const OBJECT_LEVEL = 1;

/**
 * Compress bytes into a single zstd frame
 */
export function compress(bytes: Uint8Array, level: number): Uint8Array {
  const out = zstd.compress(bytes, { compressionLevel: level });
  return new Uint8Array(out.buffer, out.byteOffset, out.byteLength);
}

/**
 * Decompress a zstd frame produced by {@link compress}
 * @throws Error from the native decoder when the input is not a zstd frame
 */
export function decompress(bytes: Uint8Array): Uint8Array {
  const out = zstd.decompress(bytes);
  return new Uint8Array(out.buffer, out.byteOffset, out.byteLength);
}

/**
 * True when the bytes start with the zstd frame magic number
 */
export function isCompressedFrame(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 4 &&
    bytes[0] === 0x28 &&
    bytes[1] === 0xb5 &&
    bytes[2] === 0x2f &&
    bytes[3] === 0xfd
  );
}
