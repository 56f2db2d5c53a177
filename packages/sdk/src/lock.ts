/**
 * File-based writer lock for an index directory
 * Uses exclusive file open to ensure only one writer at a time
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StoreLockedError, StoreUnavailableError } from "./errors.js";
import { errorCode, errorMessage } from "./io.js";
import { logger } from "./observability/logs.js";

export const META_DIR = "_meta";
export const LOCK_NAME = "write.lock";
/** Held while a stale lock is being removed */
export const TAKEOVER_NAME = "write.lock.takeover";

export interface LockInfo {
  pid: number;
  acquiredAt: string;
}

export interface AcquireOptions {
  /** Maximum time to wait for a live holder to release (default: 0, fail at once) */
  timeoutMs?: number;
  /** Time between retry attempts (default: 100ms) */
  retryIntervalMs?: number;
}

/**
 * Simple file-based lock using exclusive open
 */
export class FileLock {
  #root: string;
  #lockPath: string;
  #takeoverPath: string;
  #fd?: fs.FileHandle;
  #acquired = false;

  constructor(root: string) {
    this.#root = root;
    this.#lockPath = path.join(root, META_DIR, LOCK_NAME);
    this.#takeoverPath = path.join(root, META_DIR, TAKEOVER_NAME);
  }

  get lockPath(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock
   * A lock file left behind by a process that is no longer running is removed.
   * @throws StoreLockedError if a live holder keeps the lock past the timeout
   * @throws StoreUnavailableError if the lock file cannot be created
   */
  async acquire(options: AcquireOptions = {}): Promise<void> {
    if (this.#acquired) {
      throw new Error("Lock already acquired");
    }

    const timeoutMs = options.timeoutMs ?? 0;
    const retryIntervalMs = options.retryIntervalMs ?? 100;
    const startTime = Date.now();

    try {
      await fs.mkdir(path.dirname(this.#lockPath), { recursive: true });
    } catch (err) {
      throw new StoreUnavailableError(this.#root, { cause: err });
    }

    while (true) {
      try {
        // Fails with EEXIST if another handle holds the lock
        this.#fd = await fs.open(this.#lockPath, "wx");
        this.#acquired = true;

        const lockInfo: LockInfo = {
          pid: process.pid,
          acquiredAt: new Date().toISOString(),
        };
        await this.#fd.writeFile(JSON.stringify(lockInfo, null, 2));
        await this.#fd.sync();

        return;
      } catch (err) {
        if (this.#acquired) {
          // Lock file was created but could not be written; give it back
          await this.release();
          throw new StoreUnavailableError(this.#root, { cause: err });
        }
        if (errorCode(err) !== "EEXIST") {
          throw new StoreUnavailableError(this.#root, { cause: err });
        }

        const holder = await this.#readHolder();
        if (holder && !isProcessAlive(holder.pid) && (await this.#takeOver(holder.pid))) {
          continue;
        }

        if (Date.now() - startTime >= timeoutMs) {
          throw new StoreLockedError(this.#root, holder?.pid);
        }

        await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
      }
    }
  }

  /**
   * Release the lock
   */
  async release(): Promise<void> {
    if (!this.#acquired) {
      return;
    }

    try {
      if (this.#fd) {
        await this.#fd.close();
        this.#fd = undefined;
      }

      await fs.unlink(this.#lockPath);
    } catch (err) {
      // Already cleaned up (e.g. the index directory was removed)
      if (errorCode(err) !== "ENOENT") {
        logger.error("store.lock.release", { index: this.#root, message: errorMessage(err) });
      }
    } finally {
      this.#acquired = false;
    }
  }

  /**
   * Check if lock is acquired
   */
  isAcquired(): boolean {
    return this.#acquired;
  }

  /**
   * Remove a lock file whose holder is gone
   *
   * Only the handle that holds the takeover file may unlink the lock, and it
   * re-reads the lock first: a contender that saw the same dead pid finds the
   * winner's live lock instead and leaves it alone.
   * @returns true when the caller should retry creating the lock at once
   */
  async #takeOver(stalePid: number): Promise<boolean> {
    let guard: fs.FileHandle;
    try {
      guard = await fs.open(this.#takeoverPath, "wx");
    } catch (err) {
      if (errorCode(err) !== "EEXIST") {
        throw new StoreUnavailableError(this.#root, { cause: err });
      }
      return this.#clearDeadTakeover();
    }

    try {
      await guard.writeFile(String(process.pid));
      const holder = await this.#readHolder();
      if (holder?.pid === stalePid) {
        logger.warn("store.lock.stale", {
          index: this.#root,
          message: `Removing lock left by process ${stalePid}`,
          details: { acquiredAt: holder.acquiredAt },
        });
        await FileLock.forceRemove(this.#root);
      }
      return true;
    } finally {
      await guard.close();
      await unlinkIfPresent(this.#takeoverPath, this.#root);
    }
  }

  /**
   * A takeover file outlives its process only if that process died mid-takeover
   * @returns true when a dead takeover was cleared
   */
  async #clearDeadTakeover(): Promise<boolean> {
    let content: string;
    try {
      content = await fs.readFile(this.#takeoverPath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return true;
      }
      throw new StoreUnavailableError(this.#root, { cause: err });
    }

    const pid = Number.parseInt(content, 10);
    if (!Number.isInteger(pid) || isProcessAlive(pid)) {
      return false;
    }
    await unlinkIfPresent(this.#takeoverPath, this.#root);
    return true;
  }

  /**
   * Read the holder recorded in the lock file
   * Undefined while the holder is still writing it or when it is not ours to parse.
   */
  async #readHolder(): Promise<LockInfo | undefined> {
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(this.#lockPath, "utf-8"));
      if (
        parsed &&
        typeof parsed === "object" &&
        "pid" in parsed &&
        typeof parsed.pid === "number" &&
        Number.isInteger(parsed.pid)
      ) {
        const acquiredAt = "acquiredAt" in parsed && typeof parsed.acquiredAt === "string" ? parsed.acquiredAt : "";
        return { pid: parsed.pid, acquiredAt };
      }
      return undefined;
    } catch (err) {
      if (err instanceof SyntaxError || errorCode(err) === "ENOENT") {
        return undefined;
      }
      throw new StoreUnavailableError(this.#root, { cause: err });
    }
  }

  /**
   * Force remove a lock file
   * Only safe when the process that created it is gone
   */
  static async forceRemove(root: string): Promise<void> {
    await unlinkIfPresent(path.join(root, META_DIR, LOCK_NAME), root);
  }
}

async function unlinkIfPresent(filePath: string, root: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (errorCode(err) !== "ENOENT") {
      throw new StoreUnavailableError(root, { cause: err });
    }
  }
}

/**
 * Signal 0 probes for existence without touching the process
 */
function isProcessAlive(pid: number): boolean {
  if (pid === process.pid) {
    return true;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(err) === "EPERM";
  }
}
