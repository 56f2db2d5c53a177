/**
 * topicsearch SDK
 *
 * On-disk full-text index of urls and their predicted topics
 */

// Re-export types
export type {
  Term,
  Url,
  Document,
  OpenMode,
  OpenIndexOptions,
  Posting,
  UpsertStatus,
  UpsertResult,
  CommitResult,
  IndexStats,
  SearchableIndex,
  SearchOptions,
  SearchHit,
  IndexEntry,
  IndexOutcome,
  IndexOutcomeStatus,
  IndexingOptions,
  IndexingReport,
} from "./types.js";

// Document model and tokenizer
export { makeDocument, termFrequencies } from "./document.js";
export { tokenize, uniqueTerms } from "./tokenizer.js";

// Store
export { openIndexStore, openIndexReader, IndexStore, IndexReader } from "./store.js";
export type { OpenStoreOptions } from "./store.js";
export { SNAPSHOT_FILE } from "./snapshot.js";

// Query engine and batch indexing
export { search, searchHits, searchIndex, inverseDocumentFrequency } from "./query.js";
export { indexDocuments } from "./indexer.js";

// Utilities
export { stableStringify } from "./format.js";
export { logger } from "./observability/logs.js";
export type { LogLevel } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { Operation, OperationMetrics } from "./observability/metrics.js";

// Re-export errors
export {
  TopicSearchError,
  InvalidDocumentError,
  InvalidArgumentError,
  StoreUnavailableError,
  StoreClosedError,
  StoreLockedError,
  IndexUnavailableError,
} from "./errors.js";
