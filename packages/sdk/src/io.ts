/**
 * Atomic file I/O operations for crash-safe index commits
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; a missing file reads as undefined
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import { StoreUnavailableError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Extract the errno code (ENOENT, EEXIST, ...) from an unknown thrown value
 */
export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @throws StoreUnavailableError if the directory cannot be created
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new StoreUnavailableError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @throws StoreUnavailableError if any step fails; the previous file stays intact
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to a full sync where it is not supported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    try {
      await fs.rename(tmp, filePath);
    } catch (err) {
      // Windows: antivirus or indexing may hold the target briefly
      const code = errorCode(err);
      if ((code === "EPERM" || code === "EACCES" || code === "EBUSY") && process.platform === "win32") {
        await new Promise((resolve) => setTimeout(resolve, 10));
        await fs.rename(tmp, filePath);
      } else {
        throw err;
      }
    }

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.close.failed", { message: errorMessage(closeErr), details: { file: tmp } });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errorCode(unlinkErr) !== "ENOENT") {
        logger.debug("io.cleanup.failed", { message: errorMessage(unlinkErr), details: { file: tmp } });
      }
    });

    if (err instanceof StoreUnavailableError) {
      throw err;
    }
    throw new StoreUnavailableError(filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory so a completed rename survives a crash
 */
async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // EINVAL/ENOTSUP/EBADF: platform has no directory fsync
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR" && code !== "EPERM") {
      logger.debug("io.dirsync.failed", { message: errorMessage(err), details: { dir } });
    }
  }
}

/**
 * Read a UTF-8 text file
 * @returns File contents, or undefined when the file does not exist
 */
export async function readTextFile(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return undefined;
    }
    throw err;
  }
}

/**
 * Remove every entry of a directory except the names listed in `keep`
 * @returns Number of entries removed
 * @throws StoreUnavailableError if an entry cannot be removed
 */
export async function clearDirectory(dirPath: string, keep: readonly string[] = []): Promise<number> {
  let removed = 0;
  try {
    const entries = await fs.readdir(dirPath);
    for (const name of entries.sort()) {
      if (keep.includes(name)) continue;
      await fs.rm(join(dirPath, name), { recursive: true, force: true });
      removed++;
    }
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return removed;
    }
    throw new StoreUnavailableError(dirPath, { cause: err });
  }
  return removed;
}
