/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Castra } from "@castra/core";
import type { CastraOptions } from "@castra/core";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "castra-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempStoreRoot(prefix = "castra-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a persistent store in a fresh directory, cleaning up after
 * @param options - Store options (path will be overridden)
 * @param fn - Function to execute with store and its directory
 * @returns Result of fn
 */
export async function withTempStore<T>(
  options: Omit<CastraOptions, "path">,
  fn: (store: Castra, root: string) => Promise<T>
): Promise<T> {
  const parent = await createTempStoreRoot();
  const root = join(parent, "store");
  let store: Castra;
  try {
    store = await Castra.open({ ...options, path: root });
  } catch (err) {
    await removeDir(parent);
    throw err;
  }

  try {
    return await fn(store, root);
  } finally {
    try {
      await store.close();
    } finally {
      await removeDir(parent);
    }
  }
}
