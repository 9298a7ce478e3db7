/**
 * Column file codec
 *
 * Two on-disk formats, told apart by the first bytes of the file:
 *
 * Numeric container (fixed-width dtypes), little-endian:
 * ┌───────────────────────────────────────────────┐
 * │ magic "CSTR" (4) │ version u8 │ dtype code u8  │
 * │ element size u8  │ flags u8   │ level u8       │
 * │ reserved (3)     │ element count u64           │
 * │ block size u32   │ block count u32 │ reserved  │
 * ├───────────────────────────────────────────────┤
 * │ per block: compressed length u32, zstd frame  │
 * └───────────────────────────────────────────────┘
 * No offsets table and no checksums are stored.
 *
 * Object blob: a JSON array of the values, compressed as one zstd frame. NaN,
 * infinities and -0 are tagged objects in that array (see format.ts).
 *
 * Decoding probes the container first; anything without the container magic
 * falls back to the object path.
 */

import {
  dtypeCode,
  dtypeFromCode,
  elementSize,
  fromBytes,
  isFloatDType,
  isNumericDType,
  toBytes,
} from "../dtypes.js";
import { CorruptColumnError, DecodeFormatError } from "../errors.js";
import { parseJson, toJson } from "../format.js";
import { atomicWrite, readBytes } from "../io.js";
import type { Column, NumericDType, Scalar } from "../types.js";
import {
  compress,
  decompress,
  FLOAT_LEVEL,
  INTEGER_LEVEL,
  isCompressedFrame,
  OBJECT_LEVEL,
} from "./compression.js";
import { shuffle, unshuffle } from "./shuffle.js";

const MAGIC = [0x43, 0x53, 0x54, 0x52]; // "CSTR"
const FORMAT_VERSION = 1;
const HEADER_SIZE = 32;
const FLAG_SHUFFLE = 0x01;

/** Raw bytes per compressed block unless overridden */
export const DEFAULT_BLOCK_SIZE = 1 << 20;

export interface PackOptions {
  /** Raw bytes per block in the numeric container */
  blockSize?: number;
}

/**
 * Compression settings for a fixed-width dtype
 *
 * Integers and datetimes compress well after shuffling; floats favour decode
 * speed with a low level and no shuffle.
 */
export function blockArgs(dtype: NumericDType): { level: number; shuffle: boolean } {
  if (isFloatDType(dtype)) {
    return { level: FLOAT_LEVEL, shuffle: false };
  }
  return { level: INTEGER_LEVEL, shuffle: true };
}

/**
 * Raised inside the numeric decoder when the file is not a numeric container
 */
class FormatMismatch extends Error {}

/**
 * Encode a column into the bytes of a column file
 */
export function encodeColumn(column: Column, options: PackOptions = {}): Uint8Array {
  if (isNumericDType(column.dtype) && !Array.isArray(column.values)) {
    return encodeNumeric(column.dtype, toBytes(column.values), options.blockSize);
  }
  return encodeObject(column.values);
}

/**
 * Decode the bytes of a column file
 * @param source - File path, used in error messages
 */
export function decodeColumn(bytes: Uint8Array, source: string): Column {
  try {
    return decodeNumeric(bytes, source);
  } catch (err) {
    if (!(err instanceof FormatMismatch)) {
      throw err;
    }
  }
  return decodeObject(bytes, source);
}

/**
 * Write a column to a file
 */
export async function pack(column: Column, filePath: string, options?: PackOptions): Promise<void> {
  await atomicWrite(filePath, encodeColumn(column, options));
}

/**
 * Read a column from a file written by {@link pack}
 * @throws {ColumnFileNotFoundError} If the file does not exist
 * @throws {CorruptColumnError} If the numeric container is inconsistent
 * @throws {DecodeFormatError} If neither format can read the file
 */
export async function unpack(filePath: string): Promise<Column> {
  const bytes = await readBytes(filePath);
  return decodeColumn(bytes, filePath);
}

function encodeNumeric(dtype: NumericDType, raw: Uint8Array, blockSize = DEFAULT_BLOCK_SIZE): Uint8Array {
  const size = elementSize(dtype);
  // Keep blocks aligned to whole elements
  const alignedBlock = Math.max(size, blockSize - (blockSize % size));
  const args = blockArgs(dtype);

  const blocks: Uint8Array[] = [];
  for (let offset = 0; offset < raw.length; offset += alignedBlock) {
    let chunk = raw.subarray(offset, Math.min(raw.length, offset + alignedBlock));
    if (args.shuffle) {
      chunk = shuffle(chunk, size);
    }
    blocks.push(compress(chunk, args.level));
  }

  const total = HEADER_SIZE + blocks.reduce((sum, b) => sum + 4 + b.length, 0);
  const out = new Uint8Array(total);
  const view = new DataView(out.buffer);

  out.set(MAGIC, 0);
  view.setUint8(4, FORMAT_VERSION);
  view.setUint8(5, dtypeCode(dtype));
  view.setUint8(6, size);
  view.setUint8(7, args.shuffle ? FLAG_SHUFFLE : 0);
  view.setUint8(8, args.level);
  view.setBigUint64(12, BigInt(raw.length / size), true);
  view.setUint32(20, alignedBlock, true);
  view.setUint32(24, blocks.length, true);

  let offset = HEADER_SIZE;
  for (const block of blocks) {
    view.setUint32(offset, block.length, true);
    out.set(block, offset + 4);
    offset += 4 + block.length;
  }
  return out;
}

function decodeNumeric(bytes: Uint8Array, source: string): Column {
  if (bytes.length < MAGIC.length || MAGIC.some((b, i) => bytes[i] !== b)) {
    throw new FormatMismatch();
  }
  if (bytes.length < HEADER_SIZE) {
    throw new CorruptColumnError(source, "truncated header");
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const version = view.getUint8(4);
  if (version !== FORMAT_VERSION) {
    throw new CorruptColumnError(source, `unsupported format version ${version}`);
  }

  const dtype = dtypeFromCode(view.getUint8(5));
  if (!dtype) {
    throw new CorruptColumnError(source, `unknown dtype code ${view.getUint8(5)}`);
  }
  const size = elementSize(dtype);
  if (view.getUint8(6) !== size) {
    throw new CorruptColumnError(source, `element size ${view.getUint8(6)} does not match ${dtype}`);
  }

  const shuffled = (view.getUint8(7) & FLAG_SHUFFLE) !== 0;
  const count = Number(view.getBigUint64(12, true));
  const blockSize = view.getUint32(20, true);
  const blockCount = view.getUint32(24, true);
  const rawLength = count * size;

  if (blockSize === 0 || blockSize % size !== 0) {
    throw new CorruptColumnError(source, `invalid block size ${blockSize}`);
  }
  if (blockCount !== Math.ceil(rawLength / blockSize)) {
    throw new CorruptColumnError(source, `expected ${Math.ceil(rawLength / blockSize)} blocks, header says ${blockCount}`);
  }

  const raw = new Uint8Array(rawLength);
  let offset = HEADER_SIZE;
  for (let i = 0; i < blockCount; i++) {
    if (offset + 4 > bytes.length) {
      throw new CorruptColumnError(source, `truncated at block ${i}`);
    }
    const length = view.getUint32(offset, true);
    const start = offset + 4;
    if (start + length > bytes.length) {
      throw new CorruptColumnError(source, `truncated at block ${i}`);
    }

    let chunk: Uint8Array;
    try {
      chunk = decompress(bytes.subarray(start, start + length));
    } catch (err) {
      throw new CorruptColumnError(source, `block ${i} does not decompress`, { cause: err });
    }
    if (shuffled) {
      chunk = unshuffle(chunk, size);
    }

    const expected = Math.min(blockSize, rawLength - i * blockSize);
    if (chunk.length !== expected) {
      throw new CorruptColumnError(source, `block ${i} holds ${chunk.length} bytes, expected ${expected}`);
    }
    raw.set(chunk, i * blockSize);
    offset = start + length;
  }

  if (offset !== bytes.length) {
    throw new CorruptColumnError(source, `${bytes.length - offset} trailing bytes`);
  }

  return { dtype, values: fromBytes(dtype, raw) };
}

function encodeObject(values: ArrayLike<unknown>): Uint8Array {
  const list: Scalar[] = [];
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    list.push(typeof value === "bigint" ? Number(value) : toScalar(value));
  }
  return compress(Buffer.from(toJson(list), "utf-8"), OBJECT_LEVEL);
}

function toScalar(value: unknown): Scalar {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  throw new TypeError(`Object columns hold strings, numbers, booleans or null, got ${typeof value}`);
}

function decodeObject(bytes: Uint8Array, source: string): Column {
  if (!isCompressedFrame(bytes)) {
    throw new DecodeFormatError(source);
  }

  let parsed: unknown;
  try {
    parsed = parseJson(Buffer.from(decompress(bytes)).toString("utf-8"));
  } catch (err) {
    throw new DecodeFormatError(source, { cause: err });
  }

  if (!Array.isArray(parsed)) {
    throw new DecodeFormatError(source);
  }
  const values: Scalar[] = [];
  for (const value of parsed) {
    try {
      values.push(toScalar(value));
    } catch (err) {
      throw new DecodeFormatError(source, { cause: err });
    }
  }
  return { dtype: "object", values };
}
