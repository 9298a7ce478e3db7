/**
 * Key ordering, coercion and display
 *
 * Invariants:
 * - Keys of one store share the index dtype after coercion
 * - Numeric keys (number and bigint) compare numerically, string keys by code unit
 * - Comparing a string key with a numeric key is a KeyCoercionError
 */

import { KeyCoercionError } from "./errors.js";
import type { ColumnData, DType, Key, KeyLike } from "./types.js";

const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Three-way comparison of two keys
 */
export function compareKeys(a: Key, b: Key): number {
  if (typeof a === "string" || typeof b === "string") {
    if (typeof a !== "string" || typeof b !== "string") {
      throw new KeyCoercionError(typeof a === "string" ? b : a, "string");
    }
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Convert a caller-supplied key to the representation used by an index dtype
 *
 * `datetime` keys become epoch milliseconds as bigint; `Date` objects and ISO
 * text are accepted.
 */
export function coerceKey(dtype: DType, value: KeyLike): Key {
  switch (dtype) {
    case "datetime":
      return toEpochMillis(value);
    case "int64":
    case "uint64":
      return toBigInt(value, dtype);
    case "object":
    case "category":
      if (value instanceof Date) return value.toISOString();
      if (typeof value === "bigint") return Number(value);
      return value;
    default:
      return toNumber(value, dtype);
  }
}

function toEpochMillis(value: KeyLike): bigint {
  if (typeof value === "bigint") return value;
  if (value instanceof Date) {
    const ms = value.getTime();
    if (Number.isNaN(ms)) throw new KeyCoercionError(value, "datetime");
    return BigInt(ms);
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new KeyCoercionError(value, "datetime");
    return BigInt(Math.trunc(value));
  }
  const text = value.trim();
  if (INTEGER_TEXT.test(text)) return BigInt(text);
  const ms = Date.parse(text);
  if (Number.isNaN(ms)) throw new KeyCoercionError(value, "datetime");
  return BigInt(ms);
}

function toBigInt(value: KeyLike, dtype: DType): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  if (typeof value === "string" && INTEGER_TEXT.test(value.trim())) return BigInt(value.trim());
  throw new KeyCoercionError(value, dtype);
}

function toNumber(value: KeyLike, dtype: DType): number {
  if (value instanceof Date) throw new KeyCoercionError(value, dtype);
  if (typeof value === "string" && value.trim() === "") throw new KeyCoercionError(value, dtype);
  const n = Number(value);
  if (Number.isNaN(n)) throw new KeyCoercionError(value, dtype);
  return n;
}

/**
 * Human-readable form of a key (ISO-8601 for datetime keys)
 */
export function formatKey(dtype: DType, key: Key): string {
  if (dtype === "datetime" && typeof key === "bigint") {
    return new Date(Number(key)).toISOString();
  }
  return String(key);
}

/**
 * Form of a key safe to embed in a directory name
 *
 * Percent-encodes `%`, path separators and NUL so distinct keys stay distinct.
 */
export function escapeKey(dtype: DType, key: Key): string {
  return formatKey(dtype, key).replace(/[%/\\\0]/g, (ch) => {
    return `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`;
  });
}

/**
 * Key stored at a row of an index column
 */
export function keyAt(index: ColumnData, row: number): Key {
  const value = index[row];
  if (typeof value === "string" || typeof value === "number" || typeof value === "bigint") {
    return value;
  }
  throw new KeyCoercionError(value, "key");
}

/**
 * First position whose key is >= target (side "left") or > target (side "right")
 */
export function bisect(
  length: number,
  keyOf: (position: number) => Key,
  target: Key,
  side: "left" | "right"
): number {
  let lo = 0;
  let hi = length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const cmp = compareKeys(keyOf(mid), target);
    if (cmp < 0 || (side === "right" && cmp === 0)) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
