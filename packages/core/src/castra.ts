/**
 * Castra store implementation
 */

import * as path from "node:path";
import { CategoryRegistry } from "./categories.js";
import { pack, unpack } from "./codec/column-codec.js";
import { storageDType } from "./dtypes.js";
import {
  ConfigurationError,
  EmptyFrameError,
  KeyOrderError,
  PartitionNotFoundError,
  PathError,
  SchemaMismatchError,
  StoreClosedError,
} from "./errors.js";
import { Frame } from "./frame.js";
import {
  createDirectory,
  createTempDirectory,
  ensureDirectory,
  pathKind,
  removeDirectory,
} from "./io.js";
import { coerceKey, compareKeys, escapeKey, formatKey } from "./keys.js";
import { MetadataStore } from "./metadata.js";
import { logger } from "./observability/logs.js";
import { PartitionIndex } from "./partition-index.js";
import type {
  CastraOptions,
  Categories,
  Column,
  DType,
  Key,
  LoadPartitionOptions,
  QuerySpec,
  Schema,
  StoreState,
} from "./types.js";

/** File holding the key column inside a partition directory */
export const INDEX_FILE = ".index";

const TEMP_PREFIX = "castra-";
const RESERVED_NAMES = new Set([".", "..", INDEX_FILE]);

function validateColumnName(name: string): void {
  if (name.length === 0 || RESERVED_NAMES.has(name) || /[/\\\0]/.test(name)) {
    throw new ConfigurationError(`Invalid column name "${name}"`);
  }
}

/**
 * Resolve which template columns are dictionary-encoded
 */
function resolveCategorical(template: Frame, categories: CastraOptions["categories"]): string[] {
  if (categories === true) {
    return template.columns.filter((name) => template.dtype(name) === "object");
  }
  if (!categories) {
    return [];
  }
  for (const name of categories) {
    if (!template.has(name)) {
      throw new ConfigurationError(`Categorical column "${name}" is not in the template`);
    }
    if (template.dtype(name) !== "object") {
      throw new ConfigurationError(
        `Categorical column "${name}" must be an object column, got ${template.dtype(name)}`
      );
    }
  }
  return [...new Set(categories)];
}

/**
 * Append-only partitioned columnar store
 *
 * Each `extend` writes one immutable partition directory; `query` reads the
 * partitions covering a key range back into a single frame.
 *
 * @example
 * ```typescript
 * const store = await Castra.open({ path: "./ticks", template, categories: ["symbol"] });
 * await store.extend(batch);
 * const frame = await store.query({ start: 100, stop: 250, columns: ["price"] });
 * await store.close();
 * ```
 */
export class Castra {
  readonly path: string;
  readonly temporary: boolean;
  readonly schema: Readonly<Schema>;

  #meta: MetadataStore;
  #index: PartitionIndex;
  #registry: CategoryRegistry;
  #blockSize: number | undefined;
  #state: StoreState;
  /** Partitions were added since the index was last written */
  #dirty = false;

  private constructor(init: {
    path: string;
    temporary: boolean;
    schema: Schema;
    meta: MetadataStore;
    index: PartitionIndex;
    registry: CategoryRegistry;
    blockSize: number | undefined;
    state: StoreState;
  }) {
    this.path = init.path;
    this.temporary = init.temporary;
    this.schema = init.schema;
    this.#meta = init.meta;
    this.#index = init.index;
    this.#registry = init.registry;
    this.#blockSize = init.blockSize;
    this.#state = init.state;
  }

  /**
   * Open an existing store or create a new one from a template
   *
   * - Without `path`, a temporary store is created under the OS temp dir.
   * - With an existing store at `path`, `template` must be omitted.
   * - Without a store at `path`, `template` is required.
   *
   * @throws {PathError} If `path` exists and is not a directory
   * @throws {ConfigurationError} If the arguments contradict the directory state
   * @throws {MetadataError} If an existing store has missing or invalid metadata
   */
  static async open(options: CastraOptions = {}): Promise<Castra> {
    if (options.blockSize !== undefined && (!Number.isInteger(options.blockSize) || options.blockSize <= 0)) {
      throw new ConfigurationError(`blockSize must be a positive integer, got ${options.blockSize}`);
    }

    const temporary = options.path === undefined;
    let root: string;
    if (options.path === undefined) {
      root = await createTempDirectory(TEMP_PREFIX);
    } else {
      root = path.resolve(options.path);
      const kind = await pathKind(root);
      if (kind === "other") {
        throw new PathError(root);
      }
      if (kind === "missing") {
        await ensureDirectory(root);
      }
    }

    try {
      const meta = new MetadataStore(root);
      const hasMeta = (await pathKind(meta.dir)) === "directory";

      if (hasMeta) {
        if (options.template !== undefined) {
          throw new ConfigurationError(`'template' must be omitted when opening an existing store: ${root}`);
        }
        return await Castra.#load(root, temporary, meta, options.blockSize);
      }

      if (options.template === undefined) {
        throw new ConfigurationError(`A 'template' is required to create a new store: ${root}`);
      }
      return await Castra.#create(root, temporary, meta, options.template, options);
    } catch (err) {
      // A temporary directory nobody can reach again is removed
      if (temporary) {
        await removeDirectory(root);
      }
      throw err;
    }
  }

  static async #load(
    root: string,
    temporary: boolean,
    meta: MetadataStore,
    blockSize: number | undefined
  ): Promise<Castra> {
    const { schema, index } = await meta.load();
    const categorical = schema.columns.filter((name) => schema.dtypes[name] === "category");
    const registry = await CategoryRegistry.load(meta.categoriesDir, categorical);

    logger.info("store.open", {
      path: root,
      details: { partitions: index.size, columns: schema.columns.length },
    });

    return new Castra({ path: root, temporary, schema, meta, index, registry, blockSize, state: "open" });
  }

  static async #create(
    root: string,
    temporary: boolean,
    meta: MetadataStore,
    template: Frame,
    options: CastraOptions
  ): Promise<Castra> {
    template.columns.forEach(validateColumnName);
    const categorical = resolveCategorical(template, options.categories);

    const dtypes: Record<string, DType> = {};
    for (const name of template.columns) {
      dtypes[name] = categorical.includes(name) ? "category" : template.dtype(name);
    }
    const schema: Schema = {
      columns: [...template.columns],
      dtypes,
      indexDType: template.indexDType,
    };

    await createDirectory(meta.dir);
    await createDirectory(meta.categoriesDir);

    const index = new PartitionIndex(schema.indexDType);
    const registry = CategoryRegistry.create(meta.categoriesDir, categorical);
    await meta.flush(schema, index);

    logger.info("store.create", {
      path: root,
      details: { columns: schema.columns, categorical, temporary },
    });

    return new Castra({
      path: root,
      temporary,
      schema,
      meta,
      index,
      registry,
      blockSize: options.blockSize,
      state: "created",
    });
  }

  get state(): StoreState {
    return this.#state;
  }

  get columns(): readonly string[] {
    return this.schema.columns;
  }

  get dtypes(): Readonly<Record<string, DType>> {
    return this.schema.dtypes;
  }

  get indexDType(): DType {
    return this.schema.indexDType;
  }

  /**
   * Current dictionaries of the categorical columns
   */
  get categories(): Categories {
    return this.#registry.categories;
  }

  get partitions(): PartitionIndex {
    return this.#index;
  }

  /**
   * Lowest key stored, or null while the store is empty
   */
  get minimum(): Key | null {
    return this.#index.minimum;
  }

  /**
   * Partition boundaries `[minimum, ...maxKeys]` for a lazy wrapper
   */
  divisions(): Key[] {
    return this.#index.divisions();
  }

  /**
   * Append a batch as a new partition
   *
   * Not atomic: a failure after the partition directory is created leaves an
   * orphan directory that the partition index never references.
   *
   * @throws {EmptyFrameError} If the frame has no rows
   * @throws {SchemaMismatchError} If columns or dtypes differ from the schema
   * @throws {KeyOrderError} If keys are unsorted, NaN, or below the current maximum
   */
  async extend(frame: Frame): Promise<void> {
    this.#assertUsable();
    if (frame.length === 0) {
      throw new EmptyFrameError();
    }
    this.#assertSchema(frame);
    const [minKey, maxKey] = this.#bounds(frame);

    const name = `${escapeKey(this.indexDType, minKey)}--${escapeKey(this.indexDType, maxKey)}`;
    const dir = this.#dirname(name);
    await createDirectory(dir);

    const coded = await this.#registry.encode(frame);

    for (const column of coded.columns) {
      await pack(
        { dtype: coded.dtype(column), values: coded.column(column) },
        path.join(dir, column),
        { blockSize: this.#blockSize }
      );
    }
    await pack({ dtype: coded.indexDType, values: coded.index }, path.join(dir, INDEX_FILE), {
      blockSize: this.#blockSize,
    });

    this.#index.insert(maxKey, name, minKey);
    if (this.#index.size === 1) {
      this.#index.minimum = minKey;
    }
    this.#dirty = true;
    await this.flush();

    logger.debug("partition.write", {
      path: this.path,
      partition: name,
      details: { rows: frame.length },
    });
  }

  /**
   * Read one partition
   *
   * Entry point for wrappers that schedule partitions as independent units of work.
   * @throws {PartitionNotFoundError} If the index does not list `name`
   */
  async loadPartition(
    name: string,
    columns: readonly string[] = this.columns,
    options: LoadPartitionOptions = {}
  ): Promise<Frame> {
    this.#assertUsable();
    if (!this.#index.has(name)) {
      throw new PartitionNotFoundError(name);
    }
    this.#assertColumns(columns);

    const dir = this.#dirname(name);
    const data: Record<string, Column> = {};
    for (const column of columns) {
      data[column] = await unpack(path.join(dir, column));
    }
    const stored = await unpack(path.join(dir, INDEX_FILE));
    const frame = Frame.from({
      index: { dtype: this.indexDType, values: stored.values },
      columns: data,
    });

    return options.categorize === false ? frame : this.#registry.decode(frame);
  }

  /**
   * Read rows with `start <= key <= stop`
   *
   * Boundary partitions are trimmed to the exact bounds; categorical columns are
   * re-expanded once on the concatenated result. An uncovered range yields an
   * empty frame.
   */
  async query(spec: QuerySpec = {}): Promise<Frame> {
    this.#assertUsable();
    const columns = spec.columns ?? this.columns;
    this.#assertColumns(columns);

    const start = spec.start === undefined ? undefined : coerceKey(this.indexDType, spec.start);
    const stop = spec.stop === undefined ? undefined : coerceKey(this.indexDType, spec.stop);
    const names = this.#index.select(start, stop);

    logger.debug("query.select", {
      path: this.path,
      details: { start, stop, partitions: names },
    });

    if (names.length === 0) {
      return Frame.empty(
        this.indexDType,
        columns.map((c): [string, DType] => [c, this.dtypes[c]])
      );
    }

    const frames: Frame[] = [];
    for (const name of names) {
      frames.push(await this.loadPartition(name, columns, { categorize: false }));
    }

    frames[0] = frames[0].between(start, undefined);
    frames[frames.length - 1] = frames[frames.length - 1].between(undefined, stop);

    return this.#registry.decode(Frame.concat(frames));
  }

  /**
   * Persist the partition index if partitions were added since the last write
   */
  async flush(): Promise<void> {
    this.#assertUsable();
    if (!this.#dirty) return;
    await this.#meta.flushIndex(this.#index);
    this.#dirty = false;
  }

  /**
   * Release the store: temporary stores are dropped, persistent stores flushed
   *
   * Idempotent.
   */
  async close(): Promise<void> {
    if (this.#state === "closed" || this.#state === "dropped") {
      return;
    }
    if (this.temporary) {
      await this.drop();
      return;
    }
    await this.flush();
    this.#state = "closed";
  }

  /**
   * Remove the store directory (idempotent)
   */
  async drop(): Promise<void> {
    await removeDirectory(this.path);
    if (this.#state !== "dropped") {
      logger.info("store.drop", { path: this.path });
    }
    this.#state = "dropped";
  }

  #dirname(...parts: string[]): string {
    return path.join(this.path, ...parts);
  }

  #assertUsable(): void {
    if (this.#state === "closed" || this.#state === "dropped") {
      throw new StoreClosedError(this.path, this.#state);
    }
  }

  #assertColumns(columns: readonly string[]): void {
    for (const column of columns) {
      if (!(column in this.dtypes)) {
        throw new SchemaMismatchError(`Unknown column "${column}"`);
      }
    }
  }

  #assertSchema(frame: Frame): void {
    const expected = this.columns.join(", ");
    const actual = frame.columns.join(", ");
    if (expected !== actual) {
      throw new SchemaMismatchError(`Expected columns [${expected}], got [${actual}]`);
    }
    if (storageDType(frame.indexDType) !== storageDType(this.indexDType)) {
      throw new SchemaMismatchError(`Expected ${this.indexDType} index, got ${frame.indexDType}`);
    }
    for (const column of this.columns) {
      const want = storageDType(this.dtypes[column]);
      if (frame.dtype(column) !== want) {
        throw new SchemaMismatchError(`Column "${column}" must be ${want}, got ${frame.dtype(column)}`);
      }
    }
  }

  /**
   * Min and max key of a batch, checking order against the stored partitions
   *
   * A batch may start at the stored maximum; the two partitions then share that key.
   */
  #bounds(frame: Frame): [Key, Key] {
    for (let i = 0; i < frame.length; i++) {
      if (Number.isNaN(frame.keyAt(i))) {
        throw new KeyOrderError(`Index holds NaN at row ${i}`);
      }
    }
    for (let i = 1; i < frame.length; i++) {
      if (compareKeys(frame.keyAt(i - 1), frame.keyAt(i)) > 0) {
        throw new KeyOrderError(`Index is not sorted at row ${i}`);
      }
    }
    const minKey = frame.keyAt(0);
    const maxKey = frame.keyAt(frame.length - 1);

    const last = this.#index.last();
    if (last && compareKeys(minKey, last.maxKey) < 0) {
      throw new KeyOrderError(
        `Batch starts at ${formatKey(this.indexDType, minKey)}, before the stored maximum ${formatKey(this.indexDType, last.maxKey)}`
      );
    }
    if (last && compareKeys(maxKey, last.maxKey) === 0) {
      throw new KeyOrderError(
        `Batch ends at the stored maximum ${formatKey(this.indexDType, maxKey)}; a partition must raise it`
      );
    }
    return [minKey, maxKey];
  }
}

/**
 * Open or create a store
 * @see Castra.open
 */
export async function openCastra(options?: CastraOptions): Promise<Castra> {
  return await Castra.open(options);
}

/**
 * Run `fn` with a store and always close it afterwards
 *
 * A temporary store (no `path`) is dropped on the way out.
 */
export async function withCastra<T>(
  options: CastraOptions,
  fn: (store: Castra) => Promise<T>
): Promise<T> {
  const store = await Castra.open(options);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
