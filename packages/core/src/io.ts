/**
 * File I/O for store directories
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Missing files throw ColumnFileNotFoundError; optional reads return null instead
 * - Directory removal is idempotent
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import { ColumnFileNotFoundError, ColumnIOError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Node error code of a failed fs call, if any
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new ColumnIOError("create directory", dirPath, { cause: err });
  }
}

/**
 * Create a directory that must not exist yet
 */
export async function createDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath);
  } catch (err) {
    throw new ColumnIOError("create directory", dirPath, { cause: err });
  }
}

/**
 * Create a fresh directory under the OS temp dir
 */
export async function createTempDirectory(prefix: string): Promise<string> {
  try {
    return await fs.mkdtemp(join(tmpdir(), prefix));
  } catch (err) {
    throw new ColumnIOError("create temporary directory", join(tmpdir(), prefix), { cause: err });
  }
}

/**
 * What a path currently points at
 */
export async function pathKind(target: string): Promise<"missing" | "directory" | "other"> {
  try {
    const stats = await fs.stat(target);
    return stats.isDirectory() ? "directory" : "other";
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return "missing";
    }
    throw new ColumnIOError("stat", target, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - UTF-8 text or raw bytes
 */
export async function atomicWrite(filePath: string, content: string | Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content);

    // Sync file data to disk (prefer datasync, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await fs.rm(tmp, { force: true }).catch(() => undefined);

    throw new ColumnIOError("write file", filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory entry table
 */
async function syncDirectory(dir: string): Promise<void> {
  let dirHandle: fs.FileHandle | null = null;
  try {
    dirHandle = await fs.open(dir, "r");
    await dirHandle.sync();
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP or EBADF
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF") {
      logger.debug("directory.fsync", { path: dir, message: err instanceof Error ? err.message : String(err) });
    }
  } finally {
    await dirHandle?.close();
  }
}

/**
 * Read a file as bytes
 * @throws ColumnFileNotFoundError if the file doesn't exist
 * @throws ColumnIOError for other read failures
 */
export async function readBytes(filePath: string): Promise<Uint8Array> {
  try {
    const buffer = await fs.readFile(filePath);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new ColumnFileNotFoundError(filePath, { cause: err });
    }
    throw new ColumnIOError("read file", filePath, { cause: err });
  }
}

/**
 * Read a UTF-8 file, or null when it does not exist
 */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw new ColumnIOError("read file", filePath, { cause: err });
  }
}

/**
 * Append UTF-8 text to a file, creating it when missing
 */
export async function appendText(filePath: string, content: string): Promise<void> {
  let fileHandle: fs.FileHandle | null = null;
  try {
    fileHandle = await fs.open(filePath, "a", 0o644);
    await fileHandle.appendFile(content, "utf-8");
    await fileHandle.datasync();
  } catch (err) {
    throw new ColumnIOError("append to file", filePath, { cause: err });
  } finally {
    await fileHandle?.close();
  }
}

/**
 * Cut a file down to its first `length` bytes
 */
export async function truncateFile(filePath: string, length: number): Promise<void> {
  try {
    await fs.truncate(filePath, length);
  } catch (err) {
    throw new ColumnIOError("truncate file", filePath, { cause: err });
  }
}

/**
 * Remove a directory tree (idempotent - no error if it doesn't exist)
 */
export async function removeDirectory(dirPath: string): Promise<void> {
  try {
    await fs.rm(dirPath, { recursive: true, force: true });
  } catch (err) {
    throw new ColumnIOError("remove directory", dirPath, { cause: err });
  }
}
