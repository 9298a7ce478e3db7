/**
 * Columnar frame: ordered columns sharing one key (index) column
 */

import {
  allocate,
  concatColumns,
  inferDType,
  matchesDType,
  sliceColumn,
  storageDType,
} from "./dtypes.js";
import { SchemaMismatchError } from "./errors.js";
import { bisect, keyAt } from "./keys.js";
import type { Column, ColumnData, DType, Key } from "./types.js";

/**
 * Column given either as bare data (dtype inferred) or with an explicit dtype
 */
export type ColumnInput = ColumnData | Column;

export interface FrameInit {
  /** Key column */
  index: ColumnInput;
  /** Data columns, in order */
  columns: Record<string, ColumnInput>;
}

function isColumn(input: ColumnInput): input is Column {
  return !Array.isArray(input) && !ArrayBuffer.isView(input);
}

function normalizeInput(name: string, input: ColumnInput): Column {
  if (!isColumn(input)) {
    return { dtype: inferDType(input), values: input };
  }
  const dtype = storageDType(input.dtype);
  if (!matchesDType(dtype, input.values)) {
    throw new SchemaMismatchError(
      `Column "${name}" declared as ${input.dtype} holds ${inferDType(input.values)} data`
    );
  }
  return { dtype, values: input.values };
}

/**
 * Immutable columnar table
 *
 * All columns have the same length as the index. Dictionary-encoded columns
 * are represented with their decoded values (`object` dtype) or with their
 * integer codes while passing through the store.
 *
 * @example
 * ```typescript
 * const frame = Frame.from({
 *   index: new Int32Array([0, 1, 2]),
 *   columns: { x: new Float64Array([1.5, 2.5, 3.5]), y: ["a", "b", "a"] },
 * });
 * frame.column("y"); // ["a", "b", "a"]
 * ```
 */
export class Frame {
  readonly index: ColumnData;
  readonly indexDType: DType;
  readonly columns: readonly string[];
  #data: Map<string, Column>;

  private constructor(index: Column, columns: Map<string, Column>) {
    this.index = index.values;
    this.indexDType = index.dtype;
    this.columns = [...columns.keys()];
    this.#data = columns;

    for (const [name, column] of columns) {
      if (column.values.length !== index.values.length) {
        throw new SchemaMismatchError(
          `Column "${name}" has ${column.values.length} rows, index has ${index.values.length}`
        );
      }
    }
  }

  /**
   * Build a frame from an index and named columns
   */
  static from(init: FrameInit): Frame {
    const columns = new Map<string, Column>();
    for (const [name, input] of Object.entries(init.columns)) {
      columns.set(name, normalizeInput(name, input));
    }
    return new Frame(normalizeInput("index", init.index), columns);
  }

  /**
   * Zero-row frame with the given layout
   */
  static empty(indexDType: DType, dtypes: ReadonlyArray<[string, DType]>): Frame {
    const columns = new Map<string, Column>();
    for (const [name, dtype] of dtypes) {
      const storage = storageDType(dtype);
      columns.set(name, { dtype: storage, values: allocate(storage, 0) });
    }
    const storage = storageDType(indexDType);
    return new Frame({ dtype: storage, values: allocate(storage, 0) }, columns);
  }

  /**
   * Stack frames with identical layout in order
   * @throws {SchemaMismatchError} If column names or dtypes differ
   */
  static concat(frames: readonly Frame[]): Frame {
    const first = frames[0];
    if (!first) {
      throw new SchemaMismatchError("Cannot concatenate zero frames");
    }
    if (frames.length === 1) {
      return first;
    }

    for (const frame of frames) {
      if (!first.sameLayout(frame)) {
        throw new SchemaMismatchError("Cannot concatenate frames with different columns");
      }
    }

    const columns = new Map<string, Column>();
    for (const name of first.columns) {
      const dtype = first.dtype(name);
      columns.set(name, {
        dtype,
        values: concatColumns(
          dtype,
          frames.map((f) => f.column(name))
        ),
      });
    }
    const index = {
      dtype: first.indexDType,
      values: concatColumns(
        first.indexDType,
        frames.map((f) => f.index)
      ),
    };
    return new Frame(index, columns);
  }

  get length(): number {
    return this.index.length;
  }

  has(name: string): boolean {
    return this.#data.has(name);
  }

  /**
   * Column values by name
   * @throws {SchemaMismatchError} If the column does not exist
   */
  column(name: string): ColumnData {
    return this.#get(name).values;
  }

  dtype(name: string): DType {
    return this.#get(name).dtype;
  }

  dtypes(): Array<[string, DType]> {
    return this.columns.map((name) => [name, this.dtype(name)]);
  }

  /**
   * Key at a row
   */
  keyAt(row: number): Key {
    return keyAt(this.index, row);
  }

  /**
   * Frame restricted to the given columns, in the given order
   */
  select(names: readonly string[]): Frame {
    const columns = new Map<string, Column>();
    for (const name of names) {
      columns.set(name, this.#get(name));
    }
    return new Frame({ dtype: this.indexDType, values: this.index }, columns);
  }

  /**
   * Copy of rows [start, end)
   */
  slice(start: number, end: number = this.length): Frame {
    const columns = new Map<string, Column>();
    for (const [name, column] of this.#data) {
      columns.set(name, { dtype: column.dtype, values: sliceColumn(column.values, start, end) });
    }
    return new Frame(
      { dtype: this.indexDType, values: sliceColumn(this.index, start, end) },
      columns
    );
  }

  /**
   * Rows whose key lies in [start, stop]; assumes a sorted index
   */
  between(start?: Key, stop?: Key): Frame {
    const keyOf = (row: number): Key => keyAt(this.index, row);
    const lo = start === undefined ? 0 : bisect(this.length, keyOf, start, "left");
    const hi = stop === undefined ? this.length : bisect(this.length, keyOf, stop, "right");
    if (lo === 0 && hi === this.length) {
      return this;
    }
    return this.slice(lo, Math.max(lo, hi));
  }

  /**
   * Copy with one column replaced or appended
   */
  withColumn(name: string, input: ColumnInput): Frame {
    const columns = new Map(this.#data);
    columns.set(name, normalizeInput(name, input));
    return new Frame({ dtype: this.indexDType, values: this.index }, columns);
  }

  /**
   * Materialize rows as plain objects keyed by column name; the key is under `indexName`
   */
  toRows(indexName = "index"): Array<Record<string, unknown>> {
    const rows: Array<Record<string, unknown>> = [];
    for (let i = 0; i < this.length; i++) {
      const row: Record<string, unknown> = { [indexName]: this.index[i] };
      for (const [name, column] of this.#data) {
        row[name] = column.values[i];
      }
      rows.push(row);
    }
    return rows;
  }

  sameLayout(other: Frame): boolean {
    if (other.indexDType !== this.indexDType || other.columns.length !== this.columns.length) {
      return false;
    }
    return this.columns.every((name, i) => {
      return other.columns[i] === name && other.dtype(name) === this.dtype(name);
    });
  }

  #get(name: string): Column {
    const column = this.#data.get(name);
    if (!column) {
      throw new SchemaMismatchError(`Unknown column "${name}"`);
    }
    return column;
  }
}
