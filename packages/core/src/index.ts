/**
 * Castra
 *
 * Append-only, partitioned, columnar on-disk store for ordered tabular data
 */

// Re-export types
export type {
  DType,
  NumericDType,
  TypedArray,
  Scalar,
  ColumnData,
  Column,
  Key,
  KeyLike,
  Schema,
  Categories,
  CastraOptions,
  QuerySpec,
  LoadPartitionOptions,
  StoreState,
} from "./types.js";

// Store
export { Castra, openCastra, withCastra, INDEX_FILE } from "./castra.js";

// Tabular container
export { Frame } from "./frame.js";
export type { ColumnInput, FrameInit } from "./frame.js";

// Components
export { pack, unpack, encodeColumn, decodeColumn, blockArgs, DEFAULT_BLOCK_SIZE } from "./codec/column-codec.js";
export type { PackOptions } from "./codec/column-codec.js";
export { compress, decompress } from "./codec/compression.js";
export { decategorize, categorize, categorizeColumn, CategoryRegistry, NULL_CODE } from "./categories.js";
export type { DecategorizeResult } from "./categories.js";
export { PartitionIndex } from "./partition-index.js";
export type { PartitionEntry } from "./partition-index.js";
export { MetadataStore, META_DIR, CATEGORIES_DIR } from "./metadata.js";

// Utilities
export { compareKeys, coerceKey, formatKey } from "./keys.js";
export { DTYPES, isDType, inferDType } from "./dtypes.js";
export { logger } from "./observability/logs.js";
export type { LogContext, LogLevel, StoreEvent } from "./observability/logs.js";

// Errors
export {
  CastraError,
  ConfigurationError,
  PathError,
  DecodeFormatError,
  CorruptColumnError,
  ColumnFileNotFoundError,
  ColumnIOError,
  MetadataError,
  SchemaMismatchError,
  EmptyFrameError,
  KeyOrderError,
  KeyCoercionError,
  PartitionNotFoundError,
  StoreClosedError,
} from "./errors.js";
