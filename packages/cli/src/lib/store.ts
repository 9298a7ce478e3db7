/**
 * Store access for CLI commands
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Castra, META_DIR } from "@castra/core";
import { CliError } from "./errors.js";

/**
 * Open the existing store at `root`
 * @throws {CliError} Exit code 2 when no store lives at `root`
 */
export async function openCliStore(root: string): Promise<Castra> {
  let found: boolean;
  try {
    found = (await fs.stat(path.join(root, META_DIR))).isDirectory();
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw err;
    }
    found = false;
  }
  if (!found) {
    throw new CliError(`No Castra store at ${root}`, { exitCode: 2 });
  }
  return await Castra.open({ path: root });
}

/**
 * Run `fn` against the store at `root`, closing it afterwards
 */
export async function withCliStore<T>(root: string, fn: (store: Castra) => Promise<T>): Promise<T> {
  const store = await openCliStore(root);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
