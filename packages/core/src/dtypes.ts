/**
 * DType helpers shared by frames and the column codec
 */

import type { ColumnData, DType, NumericDType, TypedArray } from "./types.js";

/**
 * Fixed-width dtypes and the element size in bytes
 */
const ELEMENT_SIZE: Record<NumericDType, number> = {
  int8: 1,
  int16: 2,
  int32: 4,
  int64: 8,
  uint8: 1,
  uint16: 2,
  uint32: 4,
  uint64: 8,
  float32: 4,
  float64: 8,
  datetime: 8,
};

/**
 * Stable one-byte codes written into numeric column file headers
 */
const DTYPE_CODES: readonly NumericDType[] = [
  "int8",
  "int16",
  "int32",
  "int64",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "float32",
  "float64",
  "datetime",
];

export const DTYPES: readonly DType[] = [...DTYPE_CODES, "object", "category"];

export function isDType(value: string): value is DType {
  return (DTYPES as readonly string[]).includes(value);
}

export function isNumericDType(dtype: DType): dtype is NumericDType {
  return dtype !== "object" && dtype !== "category";
}

export function isFloatDType(dtype: DType): boolean {
  return dtype === "float32" || dtype === "float64";
}

export function isTypedArray(values: ColumnData): values is TypedArray {
  return !Array.isArray(values);
}

export function elementSize(dtype: NumericDType): number {
  return ELEMENT_SIZE[dtype];
}

export function dtypeCode(dtype: NumericDType): number {
  return DTYPE_CODES.indexOf(dtype);
}

export function dtypeFromCode(code: number): NumericDType | undefined {
  return DTYPE_CODES[code];
}

/**
 * DType used for values as held in memory (`category` columns hold objects)
 */
export function storageDType(dtype: DType): DType {
  return dtype === "category" ? "object" : dtype;
}

/**
 * Infer the dtype of a container; 64-bit signed arrays infer as int64
 */
export function inferDType(values: ColumnData): DType {
  if (Array.isArray(values)) return "object";
  if (values instanceof Int8Array) return "int8";
  if (values instanceof Int16Array) return "int16";
  if (values instanceof Int32Array) return "int32";
  if (values instanceof BigInt64Array) return "int64";
  if (values instanceof Uint8Array) return "uint8";
  if (values instanceof Uint16Array) return "uint16";
  if (values instanceof Uint32Array) return "uint32";
  if (values instanceof BigUint64Array) return "uint64";
  if (values instanceof Float32Array) return "float32";
  return "float64";
}

/**
 * Check that a container can hold values of the given dtype
 */
export function matchesDType(dtype: DType, values: ColumnData): boolean {
  if (!isNumericDType(dtype)) return Array.isArray(values);
  if (Array.isArray(values)) return false;
  const inferred = inferDType(values);
  return inferred === dtype || (dtype === "datetime" && inferred === "int64");
}

/**
 * Allocate a zero-filled column
 */
export function allocate(dtype: DType, length: number): ColumnData {
  switch (dtype) {
    case "int8":
      return new Int8Array(length);
    case "int16":
      return new Int16Array(length);
    case "int32":
      return new Int32Array(length);
    case "int64":
    case "datetime":
      return new BigInt64Array(length);
    case "uint8":
      return new Uint8Array(length);
    case "uint16":
      return new Uint16Array(length);
    case "uint32":
      return new Uint32Array(length);
    case "uint64":
      return new BigUint64Array(length);
    case "float32":
      return new Float32Array(length);
    case "float64":
      return new Float64Array(length);
    case "object":
    case "category":
      return new Array<null>(length).fill(null);
  }
}

/**
 * Raw little-endian bytes of a typed array (a view, not a copy)
 */
export function toBytes(values: TypedArray): Uint8Array {
  return new Uint8Array(values.buffer, values.byteOffset, values.byteLength);
}

/**
 * Build a typed array of the given dtype from raw bytes (copied into an aligned buffer)
 */
export function fromBytes(dtype: NumericDType, bytes: Uint8Array): TypedArray {
  const size = ELEMENT_SIZE[dtype];
  if (bytes.length % size !== 0) {
    throw new RangeError(`Byte length ${bytes.length} is not a multiple of ${size} for ${dtype}`);
  }
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  const length = bytes.length / size;

  switch (dtype) {
    case "int8":
      return new Int8Array(buffer, 0, length);
    case "int16":
      return new Int16Array(buffer, 0, length);
    case "int32":
      return new Int32Array(buffer, 0, length);
    case "int64":
    case "datetime":
      return new BigInt64Array(buffer, 0, length);
    case "uint8":
      return new Uint8Array(buffer, 0, length);
    case "uint16":
      return new Uint16Array(buffer, 0, length);
    case "uint32":
      return new Uint32Array(buffer, 0, length);
    case "uint64":
      return new BigUint64Array(buffer, 0, length);
    case "float32":
      return new Float32Array(buffer, 0, length);
    case "float64":
      return new Float64Array(buffer, 0, length);
  }
}

/**
 * Concatenate columns of one dtype
 */
export function concatColumns(dtype: DType, parts: ColumnData[]): ColumnData {
  if (!isNumericDType(dtype)) {
    const out: ColumnData = [];
    for (const part of parts) {
      for (let i = 0; i < part.length; i++) {
        const value = part[i];
        out.push(typeof value === "bigint" ? Number(value) : value);
      }
    }
    return out;
  }

  let total = 0;
  const chunks: Uint8Array[] = [];
  for (const part of parts) {
    if (Array.isArray(part)) {
      throw new TypeError(`Cannot concatenate an object column into ${dtype}`);
    }
    const bytes = toBytes(part);
    chunks.push(bytes);
    total += bytes.length;
  }

  const joined = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    joined.set(chunk, offset);
    offset += chunk.length;
  }
  return fromBytes(dtype, joined);
}

/**
 * Copy of rows [start, end)
 */
export function sliceColumn(values: ColumnData, start: number, end: number): ColumnData {
  return values.slice(start, end);
}
