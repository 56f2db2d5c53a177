/**
 * Index store: durable, queryable persistence of topic documents
 *
 * Layout of an index directory:
 * - index.json: last committed snapshot, replaced atomically on every commit
 * - _meta/write.lock: held by the single writer handle
 *
 * One writer (`IndexStore`) and any number of readers (`IndexReader`) may work on
 * the same directory. A reader loads one snapshot when it opens and keeps it, so
 * it sees each document either entirely before or entirely after a commit.
 *
 * @example
 * ```typescript
 * const store = await openIndexStore("/tmp/topics", { mode: "flush" });
 * store.upsert(makeDocument("http://a.com", ["technology", "ai"]));
 * await store.commit();
 * await store.close();
 *
 * const reader = await openIndexReader("/tmp/topics");
 * search(reader, "technology"); // ["http://a.com"]
 * ```
 */

import * as path from "node:path";
import { makeDocument } from "./document.js";
import { IndexUnavailableError, InvalidArgumentError, StoreClosedError } from "./errors.js";
import { InvertedIndex } from "./inverted-index.js";
import { atomicWrite, clearDirectory, ensureDirectory, errorCode, readTextFile } from "./io.js";
import { FileLock, META_DIR } from "./lock.js";
import { Mutex } from "./mutex.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { SNAPSHOT_FILE, decodeSnapshot, encodeSnapshot, type DecodedSnapshot } from "./snapshot.js";
import type {
  CommitResult,
  Document,
  IndexStats,
  OpenIndexOptions,
  OpenMode,
  Posting,
  SearchableIndex,
  Term,
  UpsertResult,
  Url,
} from "./types.js";

const OPEN_MODES: readonly OpenMode[] = ["openOrCreate", "flush"];

export interface OpenStoreOptions extends OpenIndexOptions {
  /** How long to wait for another writer to release the lock (default: 0, fail at once) */
  lockTimeoutMs?: number;
}

/**
 * Writer handle over an index directory
 */
export class IndexStore {
  #root: string;
  #lock: FileLock;
  #index: InvertedIndex;
  #commitMutex = new Mutex();
  #generation: number;
  /** Bumped on every mutation; compared with the revision last committed */
  #revision = 0;
  #committedRevision = 0;
  #closed = false;

  constructor(root: string, lock: FileLock, index: InvertedIndex, generation: number) {
    this.#root = root;
    this.#lock = lock;
    this.#index = index;
    this.#generation = generation;
  }

  /**
   * Absolute path of the index directory
   */
  get path(): string {
    return this.#root;
  }

  get generation(): number {
    return this.#generation;
  }

  /**
   * Add a document, or replace the indexed version with the same url
   * The change is visible to this handle at once and to readers after `commit()`.
   * @throws InvalidDocumentError if the document is malformed; the index is untouched
   * @throws StoreClosedError if the handle is closed
   */
  upsert(document: Document): UpsertResult {
    this.#assertOpen();

    return metrics.measure("upsert", () => {
      // Re-validate and copy: callers may hand us objects not built by makeDocument
      const doc = makeDocument(document.url, document.topics, { title: document.title });
      const status = this.#index.put(doc);
      if (status !== "unchanged") {
        this.#revision++;
      }
      logger.debug("store.upsert", { index: this.#root, url: doc.url, details: { status } });
      return { url: doc.url, status };
    });
  }

  /**
   * Delete a document and its postings
   * @returns false when the url was not indexed
   */
  remove(url: Url): boolean {
    this.#assertOpen();

    const removed = this.#index.remove(url);
    if (removed) {
      this.#revision++;
    }
    return removed;
  }

  /**
   * Whether a url is present in this handle's (possibly uncommitted) state
   */
  has(url: Url): boolean {
    this.#assertOpen();
    return this.#index.has(url);
  }

  /**
   * Make every prior upsert durable and visible to readers opened afterwards
   * @throws StoreUnavailableError if the snapshot cannot be written; the last
   * committed snapshot stays in place and pending changes are kept
   */
  async commit(): Promise<CommitResult> {
    this.#assertOpen();

    return this.#commitMutex.withLock(async () => {
      this.#assertOpen();

      return metrics.measureAsync("commit", async () => {
        // Serialize synchronously: upserts made while the write is in flight go to the next commit
        const generation = this.#generation + 1;
        const revision = this.#revision;
        const content = encodeSnapshot(this.#index, generation, new Date());

        await atomicWrite(path.join(this.#root, SNAPSHOT_FILE), content);

        this.#generation = generation;
        this.#committedRevision = revision;

        const result: CommitResult = {
          generation,
          documents: this.#index.documentCount,
          terms: this.#index.termCount,
        };
        logger.info("store.commit", {
          index: this.#root,
          details: { ...result, bytes: Buffer.byteLength(content, "utf-8") },
        });
        return result;
      });
    });
  }

  stats(): IndexStats {
    this.#assertOpen();
    return {
      documents: this.#index.documentCount,
      terms: this.#index.termCount,
      postings: this.#index.postingCount,
      generation: this.#generation,
      pending: this.#revision !== this.#committedRevision,
    };
  }

  /**
   * Release the writer lock; uncommitted changes are discarded
   * Idempotent.
   */
  async close(): Promise<void> {
    if (this.#closed) return;

    // Let an in-flight commit finish before the lock goes away
    await this.#commitMutex.withLock(async () => {
      if (this.#closed) return;
      this.#closed = true;

      if (this.#revision !== this.#committedRevision) {
        logger.warn("store.close", {
          index: this.#root,
          message: "Closing with uncommitted changes; they are discarded",
        });
      }

      await this.#lock.release();
      logger.debug("store.close", { index: this.#root });
    });
  }

  isClosed(): boolean {
    return this.#closed;
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new StoreClosedError(this.#root);
    }
  }
}

/**
 * Read-only snapshot of a committed index
 */
export class IndexReader implements SearchableIndex {
  #root: string;
  #index: InvertedIndex;
  #generation: number;
  #committedAt: string;
  #closed = false;

  constructor(root: string, snapshot: DecodedSnapshot) {
    this.#root = root;
    this.#index = snapshot.index;
    this.#generation = snapshot.generation;
    this.#committedAt = snapshot.committedAt;
  }

  get path(): string {
    return this.#root;
  }

  get generation(): number {
    return this.#generation;
  }

  /**
   * ISO timestamp of the commit this reader sees
   */
  get committedAt(): string {
    return this.#committedAt;
  }

  get documentCount(): number {
    this.#assertOpen();
    return this.#index.documentCount;
  }

  postings(term: Term): readonly Posting[] {
    this.#assertOpen();
    return this.#index.postings(term);
  }

  document(url: Url): Document | undefined {
    this.#assertOpen();
    return this.#index.document(url);
  }

  /**
   * All documents of the snapshot, sorted by url
   */
  documents(): Document[] {
    this.#assertOpen();
    return this.#index.documents();
  }

  stats(): IndexStats {
    this.#assertOpen();
    return {
      documents: this.#index.documentCount,
      terms: this.#index.termCount,
      postings: this.#index.postingCount,
      generation: this.#generation,
      pending: false,
    };
  }

  close(): void {
    this.#closed = true;
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new StoreClosedError(this.#root);
    }
  }
}

/**
 * Open (or create) an index for writing
 *
 * - openOrCreate: load the committed snapshot; an absent one is created empty and committed
 * - flush: delete everything at the path, then commit a fresh empty index
 *
 * @throws InvalidArgumentError for an unknown mode
 * @throws StoreUnavailableError if the path cannot be created or written
 * @throws StoreLockedError if another live writer holds the index
 * @throws IndexUnavailableError if an existing snapshot is corrupt (openOrCreate)
 */
export async function openIndexStore(indexPath: string, options: OpenStoreOptions = {}): Promise<IndexStore> {
  const mode = options.mode ?? "openOrCreate";
  if (!OPEN_MODES.includes(mode)) {
    throw new InvalidArgumentError("mode", `expected one of ${OPEN_MODES.join(", ")}, got "${String(mode)}"`);
  }

  const root = path.resolve(indexPath);

  return metrics.measureAsync("open", async () => {
    await ensureDirectory(root);

    const lock = new FileLock(root);
    await lock.acquire({ timeoutMs: options.lockTimeoutMs ?? 0 });

    try {
      let snapshot: DecodedSnapshot | undefined;
      if (mode === "flush") {
        const removed = await clearDirectory(root, [META_DIR]);
        logger.info("store.flush", { index: root, details: { removed } });
      } else {
        snapshot = await loadSnapshot(root);
      }

      const store = snapshot
        ? new IndexStore(root, lock, snapshot.index, snapshot.generation)
        : new IndexStore(root, lock, new InvertedIndex(), 0);

      if (!snapshot) {
        // Readers need a committed snapshot to open
        await store.commit();
      }

      logger.info("store.open", {
        index: root,
        details: { mode, generation: store.generation, documents: store.stats().documents },
      });
      return store;
    } catch (err) {
      await lock.release();
      throw err;
    }
  });
}

/**
 * Open the committed index for searching
 * Never takes the writer lock.
 * @throws IndexUnavailableError if the index is missing, unreadable or corrupt
 */
export async function openIndexReader(indexPath: string): Promise<IndexReader> {
  const root = path.resolve(indexPath);
  const snapshot = await loadSnapshot(root);
  if (!snapshot) {
    throw new IndexUnavailableError(root, "no committed index");
  }
  return new IndexReader(root, snapshot);
}

/**
 * Read and decode `index.json`
 * @returns undefined when no snapshot has been committed at this path
 */
async function loadSnapshot(root: string): Promise<DecodedSnapshot | undefined> {
  let content: string | undefined;
  try {
    content = await readTextFile(path.join(root, SNAPSHOT_FILE));
  } catch (err) {
    // ENOTDIR: the index path is a regular file
    const reason = errorCode(err) === "ENOTDIR" ? "not a directory" : "unreadable snapshot";
    throw new IndexUnavailableError(root, reason, { cause: err });
  }

  if (content === undefined) {
    return undefined;
  }
  return decodeSnapshot(content, root);
}
