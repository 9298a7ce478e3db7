/**
 * Error types for Castra operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - Errors about files include the absolute target path in the message
 */

/**
 * Base class for all Castra errors
 */
export abstract class CastraError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when construction arguments are missing or contradict each other
 */
export class ConfigurationError extends CastraError {
  readonly code = "E_CONFIG";
}

/**
 * Thrown when the store path exists and is not a directory
 */
export class PathError extends CastraError {
  readonly code = "E_PATH";

  constructor(path: string, options?: ErrorOptions) {
    super(`Store path must be a directory: ${path}`, options);
  }
}

/**
 * Thrown when a column file cannot be decoded by either codec path
 */
export class DecodeFormatError extends CastraError {
  readonly code = "E_DECODE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Unrecognized column file format: ${filePath}`, options);
  }
}

/**
 * Thrown when a column file has a valid container tag but inconsistent contents
 */
export class CorruptColumnError extends CastraError {
  readonly code = "E_CORRUPT";

  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`Corrupt column file ${filePath}: ${reason}`, options);
  }
}

/**
 * Thrown when a column file does not exist
 */
export class ColumnFileNotFoundError extends CastraError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Column file not found: ${filePath}`, options);
  }
}

/**
 * Thrown when reading or writing a store file fails
 */
export class ColumnIOError extends CastraError {
  readonly code = "E_IO";

  constructor(operation: string, filePath: string, options?: ErrorOptions) {
    super(`Failed to ${operation}: ${filePath}`, options);
  }
}

/**
 * Thrown when a metadata artifact is missing or unreadable
 */
export class MetadataError extends CastraError {
  readonly code = "E_META";

  constructor(
    public readonly artifact: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Metadata artifact "${artifact}" ${reason}`, options);
  }
}

/**
 * Thrown when a frame or column list does not match the store schema
 */
export class SchemaMismatchError extends CastraError {
  readonly code = "E_SCHEMA";
}

/**
 * Thrown when extending a store with a frame that has no rows
 */
export class EmptyFrameError extends CastraError {
  readonly code = "E_EMPTY";

  constructor(options?: ErrorOptions) {
    super("Cannot extend a store with an empty frame", options);
  }
}

/**
 * Thrown when keys are unsorted or overlap an existing partition
 */
export class KeyOrderError extends CastraError {
  readonly code = "E_KEY_ORDER";
}

/**
 * Thrown when a key cannot be converted to the index dtype
 */
export class KeyCoercionError extends CastraError {
  readonly code = "E_KEY";

  constructor(value: unknown, dtype: string, options?: ErrorOptions) {
    super(`Cannot use ${JSON.stringify(String(value))} as a ${dtype} key`, options);
  }
}

/**
 * Thrown when a partition name is not in the partition index
 */
export class PartitionNotFoundError extends CastraError {
  readonly code = "E_PARTITION";

  constructor(name: string, options?: ErrorOptions) {
    super(`Partition not found: ${name}`, options);
  }
}

/**
 * Thrown when a closed or dropped store is used
 */
export class StoreClosedError extends CastraError {
  readonly code = "E_CLOSED";

  constructor(path: string, state: string, options?: ErrorOptions) {
    super(`Store is ${state}: ${path}`, options);
  }
}
