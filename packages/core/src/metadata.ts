/**
 * Persistence of schema and partition index
 *
 * Each artifact is its own file under `meta/` so a missing or damaged one is
 * reported by name at load time:
 * - columns      ordered column names
 * - dtypes       column name → dtype
 * - index_dtype  dtype of the key column
 * - partitions   ordered [maxKey, name, minKey] entries; older pairs omit minKey
 * - minimum      lowest key of the first partition, or null
 */

import * as path from "node:path";
import { z } from "zod";
import { DTYPES } from "./dtypes.js";
import { MetadataError } from "./errors.js";
import { parseJson, stableStringify } from "./format.js";
import { atomicWrite, readTextIfExists } from "./io.js";
import { PartitionIndex } from "./partition-index.js";
import type { DType, Key, Schema } from "./types.js";

export const META_DIR = "meta";
export const CATEGORIES_DIR = "categories";

const DTypeSchema = z.custom<DType>(
  (value) => typeof value === "string" && (DTYPES as readonly string[]).includes(value),
  { message: "unknown dtype" }
);

const KeySchema = z.union([z.string(), z.number(), z.bigint()]);

const ColumnsSchema = z.array(z.string().min(1));
const DTypesSchema = z.record(z.string(), DTypeSchema);
const PartitionsSchema = z.array(
  z.union([z.tuple([KeySchema, z.string().min(1), KeySchema]), z.tuple([KeySchema, z.string().min(1)])])
);
const MinimumSchema = KeySchema.nullable();

export class MetadataStore {
  readonly dir: string;

  constructor(root: string) {
    this.dir = path.join(root, META_DIR);
  }

  get categoriesDir(): string {
    return path.join(this.dir, CATEGORIES_DIR);
  }

  /**
   * Write every artifact
   */
  async flush(schema: Schema, index: PartitionIndex): Promise<void> {
    await this.#write("columns", schema.columns);
    await this.#write("dtypes", schema.dtypes);
    await this.#write("index_dtype", schema.indexDType);
    await this.flushIndex(index);
  }

  /**
   * Write the partition index artifacts only (schema is immutable)
   */
  async flushIndex(index: PartitionIndex): Promise<void> {
    await this.#write("minimum", index.minimum);
    await this.#write(
      "partitions",
      index.entries().map((e) => (e.minKey === undefined ? [e.maxKey, e.name] : [e.maxKey, e.name, e.minKey]))
    );
  }

  /**
   * Read and validate every artifact
   * @throws {MetadataError} If an artifact is missing or invalid
   */
  async load(): Promise<{ schema: Schema; index: PartitionIndex }> {
    const columns = await this.#read("columns", ColumnsSchema);
    const dtypes = await this.#read("dtypes", DTypesSchema);
    const indexDType = await this.#read("index_dtype", DTypeSchema);
    const partitions = await this.#read("partitions", PartitionsSchema);
    const minimum: Key | null = await this.#read("minimum", MinimumSchema);

    for (const column of columns) {
      if (!(column in dtypes)) {
        throw new MetadataError("dtypes", `has no entry for column "${column}"`);
      }
    }

    const entries = partitions.map((entry) =>
      entry.length === 3 ? { maxKey: entry[0], name: entry[1], minKey: entry[2] } : { maxKey: entry[0], name: entry[1] }
    );
    let index: PartitionIndex;
    try {
      index = new PartitionIndex(indexDType, entries, minimum);
    } catch (err) {
      throw new MetadataError("partitions", "is not strictly ordered", { cause: err });
    }
    return { schema: { columns, dtypes, indexDType }, index };
  }

  async #write(artifact: string, value: unknown): Promise<void> {
    await atomicWrite(path.join(this.dir, artifact), stableStringify(value));
  }

  async #read<T>(artifact: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const text = await readTextIfExists(path.join(this.dir, artifact));
    if (text === null) {
      throw new MetadataError(artifact, "is missing");
    }

    let raw: unknown;
    try {
      raw = parseJson(text);
    } catch (err) {
      throw new MetadataError(artifact, "is not valid JSON", { cause: err });
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new MetadataError(artifact, "is invalid", { cause: result.error });
    }
    return result.data;
  }
}
