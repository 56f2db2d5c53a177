import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { makeDocument } from "./document.js";
import { InvalidArgumentError, StoreClosedError } from "./errors.js";
import { indexDocuments } from "./indexer.js";
import { logger } from "./observability/logs.js";
import { search } from "./query.js";
import { openIndexReader, openIndexStore, type IndexStore } from "./store.js";
import type { IndexEntry, IndexOutcome } from "./types.js";

describe("indexDocuments", () => {
  let testDir: string;
  let store: IndexStore;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "topicsearch-indexer-"));
    logger.setEnabled(false);
    store = await openIndexStore(testDir);
  });

  afterEach(async () => {
    await store.close();
    logger.setEnabled(true);
    await rm(testDir, { recursive: true, force: true });
  });

  it("should upsert every entry and commit once", async () => {
    const report = await indexDocuments(store, [
      { url: "http://a.com", topics: ["technology", "ai"] },
      { url: "http://b.com", topics: ["technology"], title: "B" },
    ]);

    expect(report).toMatchObject({
      indexed: 2,
      failed: 0,
      added: 2,
      replaced: 0,
      unchanged: 0,
      committed: true,
      generation: 2,
    });

    const reader = await openIndexReader(testDir);
    expect(search(reader, "technology")).toEqual(["http://a.com", "http://b.com"]);
    expect(reader.document("http://b.com")?.title).toBe("B");
  });

  it("should record failed entries and keep going", async () => {
    const report = await indexDocuments(store, [
      { url: "http://down.com", error: new Error("prediction failed") },
      { url: "", topics: ["ai"] },
      { url: "http://ok.com", topics: ["ai"] },
    ]);

    expect(report.indexed).toBe(1);
    expect(report.failed).toBe(2);
    expect(report.outcomes).toEqual([
      { url: "http://down.com", status: "failed", error: "prediction failed" },
      { url: "", status: "failed", error: 'Invalid document "": url must be a non-empty string' },
      { url: "http://ok.com", status: "added" },
    ]);
    expect(report.committed).toBe(true);
  });

  it("should count replaced and unchanged documents", async () => {
    store.upsert(makeDocument("http://a.com", ["ai"]));
    store.upsert(makeDocument("http://b.com", ["ml"]));

    const report = await indexDocuments(store, [
      { url: "http://a.com", topics: ["ai"] },
      { url: "http://b.com", topics: ["robotics"] },
    ]);

    expect(report).toMatchObject({ added: 0, replaced: 1, unchanged: 1, indexed: 2 });
  });

  it("should commit every N successful upserts", async () => {
    const entries: IndexEntry[] = [
      { url: "http://a.com", topics: ["ai"] },
      { url: "http://b.com", topics: ["ai"] },
      { url: "http://c.com", topics: ["ai"] },
    ];

    const report = await indexDocuments(store, entries, { commitEvery: 1 });

    // three intermediate commits plus the final one, after the open commit
    expect(report.generation).toBe(5);
    expect(store.generation).toBe(5);
  });

  it("should accept an async source and report outcomes in order", async () => {
    async function* source(): AsyncGenerator<IndexEntry> {
      yield { url: "http://a.com", topics: ["ai"] };
      yield { url: "http://b.com", error: "timeout" };
    }
    const seen: IndexOutcome[] = [];

    await indexDocuments(store, source(), { onOutcome: (o) => seen.push(o) });

    expect(seen).toEqual([
      { url: "http://a.com", status: "added" },
      { url: "http://b.com", status: "failed", error: "timeout" },
    ]);
  });

  it("should commit what was indexed before the source failed", async () => {
    async function* source(): AsyncGenerator<IndexEntry> {
      yield { url: "http://a.com", topics: ["ai"] };
      throw new Error("source broke");
    }

    await expect(indexDocuments(store, source())).rejects.toThrow("source broke");

    const reader = await openIndexReader(testDir);
    expect(search(reader, "ai")).toEqual(["http://a.com"]);
  });

  it("should abort on a closed store", async () => {
    await store.close();

    await expect(indexDocuments(store, [{ url: "http://a.com", topics: ["ai"] }])).rejects.toThrow(
      StoreClosedError
    );
  });

  it("should reject a non-positive commit interval", async () => {
    await expect(indexDocuments(store, [], { commitEvery: 0 })).rejects.toThrow(InvalidArgumentError);
  });
});
