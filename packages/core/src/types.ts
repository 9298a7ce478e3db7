/**
 * Core types for Castra
 */

import type { Frame } from "./frame.js";

/**
 * Element type of a column
 *
 * Fixed-width dtypes are held in the matching typed array. `datetime` is a
 * `BigInt64Array` of epoch milliseconds. `object` is a plain array of scalars.
 * `category` only appears in a store schema and marks an `object` column that
 * is dictionary-encoded on disk.
 */
export type DType =
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "uint8"
  | "uint16"
  | "uint32"
  | "uint64"
  | "float32"
  | "float64"
  | "datetime"
  | "object"
  | "category";

/**
 * DTypes backed by a typed array
 */
export type NumericDType = Exclude<DType, "object" | "category">;

export type TypedArray =
  | Int8Array
  | Int16Array
  | Int32Array
  | Uint8Array
  | Uint16Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

/**
 * A single value of an `object` column
 */
export type Scalar = string | number | boolean | null;

/**
 * Column storage: typed array for fixed-width dtypes, plain array otherwise
 */
export type ColumnData = TypedArray | Scalar[];

/**
 * Typed column as read back from a column file
 */
export interface Column {
  dtype: DType;
  values: ColumnData;
}

/**
 * Value of the key (index) column
 */
export type Key = number | bigint | string;

/**
 * Anything accepted where a key is expected; coerced to the index dtype
 */
export type KeyLike = Key | Date;

/**
 * Immutable description of a store's columns
 */
export interface Schema {
  /** Column names in order */
  columns: string[];
  /** Column name to dtype; dictionary-encoded columns carry `category` */
  dtypes: Record<string, DType>;
  /** DType of the key column */
  indexDType: DType;
}

/**
 * Column name to ordered dictionary; a value's code is its position
 */
export type Categories = Record<string, Scalar[]>;

/**
 * Options for opening or creating a store
 */
export interface CastraOptions {
  /**
   * Store directory. When omitted a temporary directory is created and the
   * store is dropped on close.
   */
  path?: string;
  /** Template frame defining the schema of a new store */
  template?: Frame;
  /**
   * Dictionary-encoded columns: `true` for every object column, or an explicit
   * list of object columns
   */
  categories?: boolean | string[];
  /** Raw bytes per compressed block in numeric column files (default 1 MiB) */
  blockSize?: number;
}

/**
 * Range query
 */
export interface QuerySpec {
  /** Inclusive lower bound (unbounded when omitted) */
  start?: KeyLike;
  /** Inclusive upper bound (unbounded when omitted) */
  stop?: KeyLike;
  /** Columns to return (all when omitted) */
  columns?: string[];
}

/**
 * Options for loading a single partition
 */
export interface LoadPartitionOptions {
  /** Re-expand dictionary-encoded columns (default true) */
  categorize?: boolean;
}

/**
 * Lifecycle state of a store instance
 */
export type StoreState = "created" | "open" | "closed" | "dropped";
