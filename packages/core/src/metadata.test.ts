import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MetadataStore } from "./metadata.js";
import { PartitionIndex } from "./partition-index.js";
import { MetadataError } from "./errors.js";
import type { Schema } from "./types.js";

const schema: Schema = {
  columns: ["x", "y"],
  dtypes: { x: "float64", y: "category" },
  indexDType: "int64",
};

describe("MetadataStore", () => {
  let root: string;
  let meta: MetadataStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "castra-meta-"));
    meta = new MetadataStore(root);
    await mkdir(meta.dir);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function flushSample(): Promise<void> {
    const index = new PartitionIndex("int64", [
      { maxKey: 9n, name: "0--9" },
      { maxKey: 19n, name: "10--19" },
    ]);
    index.minimum = 0n;
    await meta.flush(schema, index);
  }

  it("should round-trip schema and partition index", async () => {
    await flushSample();
    const loaded = await meta.load();

    expect(loaded.schema).toEqual(schema);
    expect(loaded.index.entries()).toEqual([
      { maxKey: 9n, name: "0--9" },
      { maxKey: 19n, name: "10--19" },
    ]);
    expect(loaded.index.minimum).toBe(0n);
  });

  it("should keep recorded partition minimums", async () => {
    const index = new PartitionIndex("int64", [
      { maxKey: 10n, name: "0--10", minKey: 0n },
      { maxKey: 20n, name: "10--20", minKey: 10n },
    ]);
    index.minimum = 0n;
    await meta.flush(schema, index);

    const loaded = await meta.load();
    expect(loaded.index.entries()).toEqual([
      { maxKey: 10n, name: "0--10", minKey: 0n },
      { maxKey: 20n, name: "10--20", minKey: 10n },
    ]);
  });

  it("should reload infinite float keys", async () => {
    const floats: Schema = { columns: ["x"], dtypes: { x: "int32" }, indexDType: "float64" };
    const index = new PartitionIndex("float64", [{ maxKey: Infinity, name: "-Infinity--Infinity", minKey: -Infinity }]);
    index.minimum = -Infinity;
    await meta.flush(floats, index);

    expect(await readFile(join(meta.dir, "partitions"), "utf-8")).toContain('"$number": "Infinity"');
    const loaded = await meta.load();
    expect(loaded.index.minimum).toBe(-Infinity);
    expect(loaded.index.last()).toEqual({ maxKey: Infinity, name: "-Infinity--Infinity", minKey: -Infinity });
  });

  it("should write bigint keys as tagged JSON", async () => {
    await flushSample();
    expect(await readFile(join(meta.dir, "minimum"), "utf-8")).toBe('{\n  "$bigint": "0"\n}\n');
  });

  it("should rewrite only the index on flushIndex()", async () => {
    await flushSample();
    const index = new PartitionIndex("int64", [{ maxKey: 5n, name: "a" }], 1n);
    await meta.flushIndex(index);

    const loaded = await meta.load();
    expect(loaded.schema).toEqual(schema);
    expect(loaded.index.names()).toEqual(["a"]);
    expect(loaded.index.minimum).toBe(1n);
  });

  it("should name a missing artifact", async () => {
    await flushSample();
    await unlink(join(meta.dir, "partitions"));
    await expect(meta.load()).rejects.toThrow('Metadata artifact "partitions" is missing');
  });

  it("should reject unparsable JSON", async () => {
    await flushSample();
    await writeFile(join(meta.dir, "columns"), "[\"x\"");
    await expect(meta.load()).rejects.toThrow('Metadata artifact "columns" is not valid JSON');
  });

  it("should reject an unknown dtype", async () => {
    await flushSample();
    await writeFile(join(meta.dir, "index_dtype"), '"complex128"\n');
    await expect(meta.load()).rejects.toThrow('Metadata artifact "index_dtype" is invalid');
  });

  it("should reject a column without a dtype", async () => {
    await flushSample();
    await writeFile(join(meta.dir, "dtypes"), '{"x": "float64"}\n');
    await expect(meta.load()).rejects.toThrow('has no entry for column "y"');
  });

  it("should reject partitions that are out of order", async () => {
    await flushSample();
    await writeFile(join(meta.dir, "partitions"), '[[5, "a"], [5, "b"]]\n');
    const err = await meta.load().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MetadataError);
    expect(err).toHaveProperty("artifact", "partitions");
  });
});
