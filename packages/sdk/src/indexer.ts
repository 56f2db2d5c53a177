/**
 * Batch indexing of resolved (url, topics) entries
 *
 * Per-entry problems (malformed document, topics the collaborator could not
 * resolve) are recorded and the batch goes on. Store lifecycle failures abort
 * the batch. A final commit runs either way, as long as the store can still take it.
 */

import { makeDocument } from "./document.js";
import {
  InvalidArgumentError,
  InvalidDocumentError,
  StoreClosedError,
  StoreUnavailableError,
} from "./errors.js";
import { errorMessage } from "./io.js";
import { logger } from "./observability/logs.js";
import type { IndexStore } from "./store.js";
import type { IndexEntry, IndexingOptions, IndexingReport, IndexOutcome } from "./types.js";

/**
 * Upsert every entry into the store, then commit
 * @returns Report with per-entry outcomes and the commit status
 * @throws StoreClosedError or StoreUnavailableError when the store fails mid-batch
 */
export async function indexDocuments(
  store: IndexStore,
  entries: Iterable<IndexEntry> | AsyncIterable<IndexEntry>,
  options: IndexingOptions = {}
): Promise<IndexingReport> {
  const { commitEvery, onOutcome } = options;
  if (commitEvery !== undefined && (!Number.isInteger(commitEvery) || commitEvery < 1)) {
    throw new InvalidArgumentError("commitEvery", `must be a positive integer, got ${commitEvery}`);
  }

  const report: IndexingReport = {
    indexed: 0,
    failed: 0,
    added: 0,
    replaced: 0,
    unchanged: 0,
    outcomes: [],
    committed: false,
  };

  const record = (outcome: IndexOutcome): void => {
    report.outcomes.push(outcome);
    if (outcome.status === "failed") {
      report.failed++;
      logger.warn("index.document.failed", { index: store.path, url: outcome.url, message: outcome.error });
    } else {
      report.indexed++;
      report[outcome.status]++;
    }
    onOutcome?.(outcome);
  };

  let sinceCommit = 0;
  let aborted: unknown;

  try {
    for await (const entry of entries) {
      if ("error" in entry) {
        record({ url: entry.url, status: "failed", error: errorMessage(entry.error) });
        continue;
      }

      let outcome: IndexOutcome;
      try {
        const doc = makeDocument(entry.url, entry.topics, { title: entry.title });
        const result = store.upsert(doc);
        outcome = { url: result.url, status: result.status };
      } catch (err) {
        if (!(err instanceof InvalidDocumentError)) {
          throw err;
        }
        outcome = { url: entry.url, status: "failed", error: err.message };
      }
      record(outcome);

      if (outcome.status !== "failed" && commitEvery !== undefined && ++sinceCommit >= commitEvery) {
        const { generation } = await store.commit();
        report.generation = generation;
        sinceCommit = 0;
      }
    }
  } catch (err) {
    aborted = err;
  }

  if (!(aborted instanceof StoreClosedError || aborted instanceof StoreUnavailableError)) {
    try {
      const { generation } = await store.commit();
      report.generation = generation;
      report.committed = true;
    } catch (err) {
      if (aborted === undefined) {
        throw err;
      }
      logger.error("index.commit.failed", { index: store.path, message: errorMessage(err) });
    }
  }

  if (aborted !== undefined) {
    throw aborted;
  }
  return report;
}
