/**
 * Basic Usage Example
 *
 * Index a few urls with their topics, commit, then search the index.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { rm } from "node:fs/promises";
import {
  indexDocuments,
  makeDocument,
  openIndexReader,
  openIndexStore,
  searchHits,
  searchIndex,
} from "@topicsearch/sdk";

async function main() {
  const indexDir = "./examples-data/basic";

  // Open a fresh index; flush discards whatever an earlier run left
  console.log("📂 Opening index...");
  const store = await openIndexStore(indexDir, { mode: "flush" });

  try {
    // Single upserts are visible to readers only after commit
    console.log("\n✏️  Adding documents...");
    store.upsert(makeDocument("http://a.com", ["Technology", "Artificial intelligence"], { title: "All about AI" }));
    store.upsert(makeDocument("http://b.com", ["Technology"]));
    const { generation, documents } = await store.commit();
    console.log(`✅ Committed generation ${generation} with ${documents} document(s)`);

    // Batches go through the indexer, which keeps going past bad entries
    console.log("\n📦 Indexing a batch...");
    const report = await indexDocuments(store, [
      { url: "http://c.com", topics: ["Cooking", "Italian cuisine"], title: "Pasta at home" },
      { url: "http://d.com", error: new Error("prediction timed out") },
      { url: "http://b.com", topics: ["Technology", "Gadgets"] },
    ]);
    console.log(
      `✅ ${report.added} added, ${report.replaced} replaced, ${report.failed} failed (generation ${report.generation})`
    );
  } finally {
    await store.close();
  }

  // SEARCH: ranked urls for a free-text query
  console.log("\n🔍 Searching...");
  for (const hit of await searchIndex(indexDir, "technology")) {
    console.log(`   ${hit.score.toFixed(3)}  ${hit.title ?? "(no title)"} ( ${hit.url} )`);
  }

  // A reader keeps one snapshot for as many queries as needed
  const reader = await openIndexReader(indexDir);
  try {
    console.log(`\n📊 ${reader.documentCount} document(s) at generation ${reader.generation}`);
    console.log("   'gadgets':", searchHits(reader, "gadgets").map((h) => h.url));
    console.log("   'gardening':", searchHits(reader, "gardening").map((h) => h.url));
  } finally {
    reader.close();
  }

  // Cleanup
  await rm("./examples-data", { recursive: true, force: true });
  console.log("\n✨ Done!");
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
