import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, writeFile, readdir, access } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { makeDocument } from "./document.js";
import {
  IndexUnavailableError,
  InvalidArgumentError,
  InvalidDocumentError,
  StoreClosedError,
  StoreLockedError,
  StoreUnavailableError,
} from "./errors.js";
import { logger } from "./observability/logs.js";
import { search } from "./query.js";
import { openIndexReader, openIndexStore, type IndexStore } from "./store.js";

describe("Index store", () => {
  let testDir: string;
  let indexDir: string;
  let store: IndexStore | undefined;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "topicsearch-store-"));
    indexDir = join(testDir, "index");
    logger.setEnabled(false);
  });

  afterEach(async () => {
    await store?.close();
    store = undefined;
    logger.setEnabled(true);
    await rm(testDir, { recursive: true, force: true });
  });

  describe("openIndexStore()", () => {
    it("should create and commit an empty index at a new path", async () => {
      store = await openIndexStore(indexDir);

      expect(store.generation).toBe(1);
      expect(store.stats()).toEqual({ documents: 0, terms: 0, postings: 0, generation: 1, pending: false });

      const reader = await openIndexReader(indexDir);
      expect(reader.documentCount).toBe(0);
      expect(reader.generation).toBe(1);
    });

    it("should resolve the path to an absolute one", async () => {
      store = await openIndexStore(indexDir);
      expect(store.path).toBe(indexDir);
    });

    it("should reload committed documents with openOrCreate", async () => {
      store = await openIndexStore(indexDir);
      store.upsert(makeDocument("http://a.com", ["technology"], { title: "A" }));
      await store.commit();
      await store.close();

      store = await openIndexStore(indexDir, { mode: "openOrCreate" });

      expect(store.generation).toBe(2);
      expect(store.has("http://a.com")).toBe(true);
      expect(store.stats().documents).toBe(1);
    });

    it("should discard existing content with flush", async () => {
      store = await openIndexStore(indexDir);
      store.upsert(makeDocument("http://a.com", ["technology"]));
      await store.commit();
      await store.close();
      await writeFile(join(indexDir, "leftover.txt"), "stale");

      store = await openIndexStore(indexDir, { mode: "flush" });

      expect(store.generation).toBe(1);
      expect(store.stats().documents).toBe(0);
      expect((await readdir(indexDir)).sort()).toEqual(["_meta", "index.json"]);
      const reader = await openIndexReader(indexDir);
      expect(search(reader, "technology")).toEqual([]);
    });

    it("should reject an unknown mode", async () => {
      const mode = JSON.parse('"append"');

      await expect(openIndexStore(indexDir, { mode })).rejects.toThrow(InvalidArgumentError);
    });

    it("should throw StoreUnavailableError when the path cannot be created", async () => {
      const blocker = join(testDir, "blocker");
      await writeFile(blocker, "regular file");

      await expect(openIndexStore(join(blocker, "index"))).rejects.toThrow(StoreUnavailableError);
    });

    it("should refuse a second writer", async () => {
      store = await openIndexStore(indexDir);

      await expect(openIndexStore(indexDir)).rejects.toThrow(StoreLockedError);
    });

    it("should allow a new writer once the first is closed", async () => {
      const first = await openIndexStore(indexDir);
      await first.close();

      store = await openIndexStore(indexDir);
      expect(store.isClosed()).toBe(false);
    });

    it("should fail on a corrupt snapshot and release the lock", async () => {
      store = await openIndexStore(indexDir);
      await store.close();
      await writeFile(join(indexDir, "index.json"), "{ not json");

      const err = await openIndexStore(indexDir).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(IndexUnavailableError);
      expect(err).toMatchObject({ reason: "corrupt snapshot" });

      store = await openIndexStore(indexDir, { mode: "flush" });
      expect(store.stats().documents).toBe(0);
    });
  });

  describe("upsert()", () => {
    beforeEach(async () => {
      store = await openIndexStore(indexDir);
    });

    it("should report added, replaced and unchanged", () => {
      const s = store;
      if (!s) throw new Error("store not opened");

      expect(s.upsert(makeDocument("http://a.com", ["ai"]))).toEqual({ url: "http://a.com", status: "added" });
      expect(s.upsert(makeDocument("http://a.com", ["ai"]))).toEqual({ url: "http://a.com", status: "unchanged" });
      expect(s.upsert(makeDocument("http://a.com", ["ml"]))).toEqual({ url: "http://a.com", status: "replaced" });
    });

    it("should be idempotent", async () => {
      const s = store;
      if (!s) throw new Error("store not opened");
      const doc = makeDocument("http://a.com", ["technology", "ai"]);

      s.upsert(doc);
      await s.commit();
      const once = s.stats();
      s.upsert(doc);

      expect(s.stats()).toEqual(once);
      expect(s.stats().pending).toBe(false);
    });

    it("should replace the prior version entirely", async () => {
      const s = store;
      if (!s) throw new Error("store not opened");

      s.upsert(makeDocument("http://a.com", ["sports"]));
      await s.commit();
      s.upsert(makeDocument("http://a.com", ["finance"]));
      await s.commit();

      const reader = await openIndexReader(indexDir);
      expect(search(reader, "sports")).toEqual([]);
      expect(search(reader, "finance")).toEqual(["http://a.com"]);
      expect(reader.postings("sports")).toEqual([]);
      expect(reader.documentCount).toBe(1);
    });

    it("should reject a malformed document and leave the index untouched", () => {
      const s = store;
      if (!s) throw new Error("store not opened");
      const before = s.stats();

      expect(() => s.upsert({ url: "", topics: ["ai"] })).toThrow(InvalidDocumentError);
      expect(s.stats()).toEqual(before);
    });

    it("should count documents with no topics", () => {
      const s = store;
      if (!s) throw new Error("store not opened");

      s.upsert(makeDocument("http://empty.com", []));

      expect(s.stats()).toMatchObject({ documents: 1, terms: 0, postings: 0, pending: true });
    });
  });

  describe("commit()", () => {
    beforeEach(async () => {
      store = await openIndexStore(indexDir);
    });

    it("should keep uncommitted changes invisible to readers", async () => {
      const s = store;
      if (!s) throw new Error("store not opened");
      s.upsert(makeDocument("http://a.com", ["technology"]));

      const before = await openIndexReader(indexDir);
      expect(search(before, "technology")).toEqual([]);

      await s.commit();

      expect(search(before, "technology")).toEqual([]);
      const after = await openIndexReader(indexDir);
      expect(search(after, "technology")).toEqual(["http://a.com"]);
    });

    it("should bump the generation on each commit", async () => {
      const s = store;
      if (!s) throw new Error("store not opened");
      s.upsert(makeDocument("http://a.com", ["technology", "ai"]));

      expect(await s.commit()).toEqual({ generation: 2, documents: 1, terms: 2 });
      expect(await s.commit()).toEqual({ generation: 3, documents: 1, terms: 2 });
    });

    it("should write a snapshot readable on its own", async () => {
      const s = store;
      if (!s) throw new Error("store not opened");
      s.upsert(makeDocument("http://a.com", ["AI"], { title: "A" }));
      await s.commit();

      const snapshot = JSON.parse(await readFile(join(indexDir, "index.json"), "utf-8"));
      expect(snapshot.documents).toEqual([["http://a.com", { title: "A", topics: ["AI"] }]]);
      expect(snapshot.postings).toEqual([["ai", [["http://a.com", 1]]]]);
      expect(snapshot.generation).toBe(2);
    });

    it("should not leave temp files behind", async () => {
      const s = store;
      if (!s) throw new Error("store not opened");
      s.upsert(makeDocument("http://a.com", ["ai"]));
      await Promise.all([s.commit(), s.commit(), s.commit()]);

      expect((await readdir(indexDir)).sort()).toEqual(["_meta", "index.json"]);
      expect(s.generation).toBe(4);
    });
  });

  describe("remove()", () => {
    it("should delete the document and its postings", async () => {
      store = await openIndexStore(indexDir);
      store.upsert(makeDocument("http://a.com", ["ai"]));
      store.upsert(makeDocument("http://b.com", ["ai", "ml"]));

      expect(store.remove("http://b.com")).toBe(true);
      expect(store.remove("http://b.com")).toBe(false);
      expect(store.stats()).toMatchObject({ documents: 1, terms: 1, postings: 1 });
    });
  });

  describe("close()", () => {
    it("should discard uncommitted changes", async () => {
      const first = await openIndexStore(indexDir);
      first.upsert(makeDocument("http://a.com", ["ai"]));
      await first.close();

      store = await openIndexStore(indexDir);
      expect(store.has("http://a.com")).toBe(false);
    });

    it("should be idempotent and reject later operations", async () => {
      const s = await openIndexStore(indexDir);
      await s.close();
      await s.close();

      expect(s.isClosed()).toBe(true);
      expect(() => s.upsert(makeDocument("http://a.com", ["ai"]))).toThrow(StoreClosedError);
      expect(() => s.stats()).toThrow(StoreClosedError);
      await expect(s.commit()).rejects.toThrow(StoreClosedError);
    });

    it("should remove the lock file", async () => {
      const s = await openIndexStore(indexDir);
      await s.close();

      await expect(access(join(indexDir, "_meta", "write.lock"))).rejects.toThrow();
    });
  });

  describe("openIndexReader()", () => {
    it("should fail when nothing was ever committed", async () => {
      const err = await openIndexReader(indexDir).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(IndexUnavailableError);
      expect(err).toMatchObject({ reason: "no committed index", code: "E_INDEX_UNAVAILABLE" });
    });

    it("should fail when the path is a regular file", async () => {
      const file = join(testDir, "file");
      await writeFile(file, "x");

      const err = await openIndexReader(file).catch((e: unknown) => e);
      expect(err).toMatchObject({ reason: "not a directory" });
    });

    it("should open while a writer holds the lock", async () => {
      store = await openIndexStore(indexDir);
      store.upsert(makeDocument("http://a.com", ["ai"], { title: "About AI" }));
      await store.commit();

      const reader = await openIndexReader(indexDir);
      expect(reader.documents()).toEqual([{ url: "http://a.com", topics: ["ai"], title: "About AI" }]);
      expect(reader.stats()).toEqual({ documents: 1, terms: 1, postings: 1, generation: 2, pending: false });
    });

    it("should read back a document whose url is __proto__", async () => {
      const writer = await openIndexStore(indexDir, { mode: "flush" });
      writer.upsert(makeDocument("__proto__", ["technology"]));
      writer.upsert(makeDocument("http://a.com", ["technology"]));
      await writer.commit();
      await writer.close();

      const reader = await openIndexReader(indexDir);
      expect(search(reader, "technology")).toEqual(["__proto__", "http://a.com"]);

      store = await openIndexStore(indexDir);
      expect(store.has("__proto__")).toBe(true);
    });

    it("should reject access after close", async () => {
      store = await openIndexStore(indexDir);
      const reader = await openIndexReader(indexDir);
      reader.close();

      expect(() => reader.documentCount).toThrow(StoreClosedError);
      expect(() => reader.postings("ai")).toThrow(StoreClosedError);
      expect(() => search(reader, "ai")).toThrow(StoreClosedError);
    });
  });
});
