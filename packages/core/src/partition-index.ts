/**
 * Ordered map from each partition's maximum key to its name
 *
 * Invariants:
 * - Max keys are strictly increasing; names appear in key order
 * - A partition may start at its predecessor's max key, never before it
 * - `minimum` is the lowest key of the first partition (null while empty)
 * - The index is the sole authority on which partitions exist
 */

import { KeyOrderError } from "./errors.js";
import { bisect, coerceKey, compareKeys, formatKey } from "./keys.js";
import type { DType, Key, KeyLike } from "./types.js";

export interface PartitionEntry {
  maxKey: Key;
  name: string;
  /** Lowest key of the partition, when recorded */
  minKey?: Key;
}

export class PartitionIndex {
  readonly keyDType: DType;
  #keys: Key[] = [];
  #names: string[] = [];
  #mins: Array<Key | undefined> = [];
  #minimum: Key | null = null;

  constructor(keyDType: DType, entries: Iterable<PartitionEntry> = [], minimum: Key | null = null) {
    this.keyDType = keyDType;
    for (const entry of entries) {
      this.insert(entry.maxKey, entry.name, entry.minKey);
    }
    this.#minimum = minimum;
  }

  get size(): number {
    return this.#keys.length;
  }

  get minimum(): Key | null {
    return this.#minimum;
  }

  set minimum(key: Key | null) {
    this.#minimum = key;
  }

  /**
   * Add a partition at its ordered position
   *
   * Without `minKey` the partition is taken to start right after its predecessor.
   * @throws {KeyOrderError} If a partition with the same max key exists
   */
  insert(maxKey: Key, name: string, minKey?: Key): void {
    const at = bisect(this.#keys.length, (i) => this.#keys[i], maxKey, "left");
    if (at < this.#keys.length && compareKeys(this.#keys[at], maxKey) === 0) {
      throw new KeyOrderError(
        `Partition with max key ${formatKey(this.keyDType, maxKey)} already exists: ${this.#names[at]}`
      );
    }
    this.#keys.splice(at, 0, maxKey);
    this.#names.splice(at, 0, name);
    this.#mins.splice(at, 0, minKey);
  }

  has(name: string): boolean {
    return this.#names.includes(name);
  }

  last(): PartitionEntry | undefined {
    const i = this.#keys.length - 1;
    return i < 0 ? undefined : this.#entry(i);
  }

  entries(): PartitionEntry[] {
    return this.#keys.map((_, i) => this.#entry(i));
  }

  names(): string[] {
    return [...this.#names];
  }

  /**
   * Partition boundaries for a lazy wrapper: `[minimum, ...maxKeys]`
   */
  divisions(): Key[] {
    if (this.#minimum === null) return [];
    return [this.#minimum, ...this.#keys];
  }

  /**
   * Names of the partitions covering the closed interval [start, stop], in key order
   *
   * Entries whose max key falls inside the interval are selected by binary
   * search. The partition after the last of them also holds keys up to `stop`
   * when it starts at or before `stop`: always when the last match ends before
   * `stop`, and at `stop` itself when that partition was recorded as starting
   * on its predecessor's max key. Bounds may be omitted.
   */
  select(start?: KeyLike, stop?: KeyLike): string[] {
    const n = this.#keys.length;
    if (n === 0) return [];

    const lo = start === undefined ? undefined : coerceKey(this.keyDType, start);
    const hi = stop === undefined ? undefined : coerceKey(this.keyDType, stop);
    if (lo !== undefined && hi !== undefined && compareKeys(lo, hi) > 0) return [];
    if (hi !== undefined && this.#minimum !== null && compareKeys(hi, this.#minimum) < 0) return [];

    const keyOf = (i: number): Key => this.#keys[i];
    const first = lo === undefined ? 0 : bisect(n, keyOf, lo, "left");
    const end = hi === undefined ? n : bisect(n, keyOf, hi, "right");

    const names = this.#names.slice(first, Math.max(first, end));
    const next = Math.max(first, end);
    if (hi !== undefined && next < n && this.#startsBy(next, hi)) {
      names.push(this.#names[next]);
    }
    return names;
  }

  /**
   * Whether partition `i` may hold a key <= `key`, given its max key is above it
   */
  #startsBy(i: number, key: Key): boolean {
    const minKey = this.#mins[i];
    if (minKey !== undefined) {
      return compareKeys(minKey, key) <= 0;
    }
    // first partition: bounded by the global minimum, checked by the caller
    if (i === 0) {
      return true;
    }
    return compareKeys(this.#keys[i - 1], key) < 0;
  }

  #entry(i: number): PartitionEntry {
    const minKey = this.#mins[i];
    const entry: PartitionEntry = { maxKey: this.#keys[i], name: this.#names[i] };
    if (minKey !== undefined) {
      entry.minKey = minKey;
    }
    return entry;
  }
}
