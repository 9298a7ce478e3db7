/**
 * Dictionary encoding of categorical columns
 *
 * Invariants:
 * - A value keeps its code (its position in the dictionary) for the life of the store
 * - Dictionaries only grow; new values are appended in first-seen order
 * - Null is never a dictionary entry; it encodes as code -1
 * - categorize(decategorize(c, f)) reproduces the values of f
 */

import * as path from "node:path";
import { CorruptColumnError } from "./errors.js";
import { parseJson, toJson } from "./format.js";
import { appendText, readTextIfExists, truncateFile } from "./io.js";
import { Frame } from "./frame.js";
import { logger } from "./observability/logs.js";
import type { Categories, ColumnData, Scalar } from "./types.js";

/** Code written for null values of a categorical column */
export const NULL_CODE = -1;

export interface DecategorizeResult {
  /** Values each column saw for the first time in this batch */
  newEntries: Categories;
  /** Dictionaries after appending the new entries */
  categories: Categories;
  /** Input frame with categorical columns replaced by int32 codes */
  frame: Frame;
}

/**
 * Lookup key for a dictionary value (keeps 1 and "1" distinct)
 */
function lookupKey(value: Scalar): string {
  return Object.is(value, -0) ? "number:-0" : `${typeof value}:${String(value)}`;
}

function toScalar(column: string, value: unknown): Scalar {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  throw new TypeError(`Categorical column "${column}" cannot hold ${typeof value} values`);
}

/**
 * Reverse lookup of a dictionary: value → code
 */
function buildLookup(dictionary: readonly Scalar[]): Map<string, number> {
  const lookup = new Map<string, number>();
  dictionary.forEach((value, code) => lookup.set(lookupKey(value), code));
  return lookup;
}

function encodeColumn(
  column: string,
  values: ColumnData,
  dictionary: readonly Scalar[],
  lookup: ReadonlyMap<string, number>
): { codes: Int32Array; added: Scalar[] } {
  const fresh = new Map<string, number>();
  const added: Scalar[] = [];
  const codes = new Int32Array(values.length);
  for (let i = 0; i < values.length; i++) {
    const value = toScalar(column, values[i]);
    if (value === null) {
      codes[i] = NULL_CODE;
      continue;
    }
    const key = lookupKey(value);
    let code = lookup.get(key) ?? fresh.get(key);
    if (code === undefined) {
      code = dictionary.length + added.length;
      fresh.set(key, code);
      added.push(value);
    }
    codes[i] = code;
  }
  return { codes, added };
}

/**
 * Replace categorical columns with integer codes, growing the dictionaries
 *
 * Columns without a dictionary pass through unchanged. Inputs are not mutated.
 *
 * @example
 * ```typescript
 * const { newEntries, categories } = decategorize({ y: ["A", "B"] }, frame); // frame.y = ["C", "B", "B"]
 * // newEntries: { y: ["C"] }, categories: { y: ["A", "B", "C"] }, codes [2, 1, 1]
 * ```
 */
export function decategorize(
  categories: Categories,
  frame: Frame,
  lookups?: ReadonlyMap<string, ReadonlyMap<string, number>>
): DecategorizeResult {
  const newEntries: Categories = {};
  const updated: Categories = {};
  let coded = frame;

  for (const [column, dictionary] of Object.entries(categories)) {
    if (!frame.has(column)) {
      newEntries[column] = [];
      updated[column] = dictionary;
      continue;
    }
    const lookup = lookups?.get(column) ?? buildLookup(dictionary);
    const { codes, added } = encodeColumn(column, frame.column(column), dictionary, lookup);
    newEntries[column] = added;
    updated[column] = added.length > 0 ? [...dictionary, ...added] : dictionary;
    coded = coded.withColumn(column, { dtype: "int32", values: codes });
  }

  return { newEntries, categories: updated, frame: coded };
}

/**
 * Map integer codes back to dictionary values for one column
 * @throws {CorruptColumnError} If a code is outside the dictionary
 */
export function categorizeColumn(column: string, codes: ColumnData, dictionary: readonly Scalar[]): Scalar[] {
  const values: Scalar[] = new Array<Scalar>(codes.length);
  for (let i = 0; i < codes.length; i++) {
    const code = Number(codes[i]);
    if (code === NULL_CODE) {
      values[i] = null;
      continue;
    }
    if (!Number.isInteger(code) || code < 0 || code >= dictionary.length) {
      throw new CorruptColumnError(column, `code ${String(codes[i])} outside dictionary of ${dictionary.length}`);
    }
    values[i] = dictionary[code];
  }
  return values;
}

/**
 * Map integer codes back to values for every column with a dictionary
 */
export function categorize(categories: Categories, frame: Frame): Frame {
  let out = frame;
  for (const [column, dictionary] of Object.entries(categories)) {
    if (!frame.has(column)) continue;
    out = out.withColumn(column, {
      dtype: "object",
      values: categorizeColumn(column, frame.column(column), dictionary),
    });
  }
  return out;
}

/**
 * In-memory dictionaries backed by append-only per-column logs
 *
 * Each log holds one JSON-encoded value per line. Appends write only the
 * entries new to that call; loading concatenates the whole log. Reverse
 * lookups are built once and grown with the dictionaries. A torn final line
 * found at load is cut off before the next append to that log.
 */
export class CategoryRegistry {
  #dir: string;
  #categories: Categories;
  #lookups = new Map<string, Map<string, number>>();
  /** Column → byte length of the complete lines of a log with a torn tail */
  #torn: Map<string, number>;

  private constructor(dir: string, categories: Categories, torn = new Map<string, number>()) {
    this.#dir = dir;
    this.#categories = categories;
    this.#torn = torn;
    for (const [column, dictionary] of Object.entries(categories)) {
      this.#lookups.set(column, buildLookup(dictionary));
    }
  }

  /**
   * Registry for a new store: empty dictionaries for the given columns
   */
  static create(dir: string, columns: readonly string[]): CategoryRegistry {
    const categories: Categories = {};
    for (const column of columns) {
      categories[column] = [];
    }
    return new CategoryRegistry(dir, categories);
  }

  /**
   * Load dictionaries for the given columns; a missing log is an empty dictionary
   */
  static async load(dir: string, columns: readonly string[]): Promise<CategoryRegistry> {
    const categories: Categories = {};
    const torn = new Map<string, number>();
    for (const column of columns) {
      const filePath = path.join(dir, column);
      const text = await readTextIfExists(filePath);
      if (text === null) {
        categories[column] = [];
        continue;
      }
      const log = parseLog(filePath, text);
      categories[column] = log.values;
      if (log.completeBytes !== null) {
        torn.set(column, log.completeBytes);
      }
    }
    return new CategoryRegistry(dir, categories, torn);
  }

  get categories(): Categories {
    return this.#categories;
  }

  get columns(): string[] {
    return Object.keys(this.#categories);
  }

  /**
   * Encode a frame, persist new dictionary entries, and adopt the grown dictionaries
   */
  async encode(frame: Frame): Promise<Frame> {
    const result = decategorize(this.#categories, frame, this.#lookups);
    await this.append(result.newEntries);

    for (const [column, entries] of Object.entries(result.newEntries)) {
      const lookup = this.#lookups.get(column);
      if (!lookup) continue;
      const base = this.#categories[column].length;
      entries.forEach((value, i) => lookup.set(lookupKey(value), base + i));
    }
    this.#categories = result.categories;
    return result.frame;
  }

  decode(frame: Frame): Frame {
    return categorize(this.#categories, frame);
  }

  /**
   * Append new entries to each column's log
   */
  async append(newEntries: Categories): Promise<void> {
    for (const [column, entries] of Object.entries(newEntries)) {
      if (entries.length === 0) continue;
      const filePath = path.join(this.#dir, column);
      const completeBytes = this.#torn.get(column);
      if (completeBytes !== undefined) {
        await truncateFile(filePath, completeBytes);
        this.#torn.delete(column);
      }
      const lines = entries.map((value) => toJson(value)).join("\n") + "\n";
      await appendText(filePath, lines);
    }
  }
}

/**
 * Entries of a dictionary log
 *
 * `completeBytes` is the length of the newline-terminated prefix when the last
 * line is torn, else null.
 */
function parseLog(filePath: string, text: string): { values: Scalar[]; completeBytes: number | null } {
  const values: Scalar[] = [];
  const lines = text.split("\n");
  // A torn final line (no trailing newline) is an interrupted append
  const torn = lines[lines.length - 1];
  let completeBytes: number | null = null;
  if (torn !== "") {
    completeBytes = Buffer.byteLength(text.slice(0, text.length - torn.length), "utf-8");
    logger.warn("categories.torn", {
      path: filePath,
      details: { ignoredBytes: Buffer.byteLength(torn, "utf-8") },
    });
  }
  for (const line of lines.slice(0, -1)) {
    let value: unknown;
    try {
      value = parseJson(line);
    } catch (err) {
      throw new CorruptColumnError(filePath, "unreadable dictionary entry", { cause: err });
    }
    if (value === null) {
      throw new CorruptColumnError(filePath, "null dictionary entry");
    }
    values.push(toScalar(path.basename(filePath), value));
  }
  return { values, completeBytes };
}
