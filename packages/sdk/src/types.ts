/**
 * Core types for topicsearch
 */

/**
 * Normalized token produced by the tokenizer
 */
export type Term = string;

/**
 * Document identity within an index
 */
export type Url = string;

/**
 * Indexable unit: a URL and the topic labels predicted for it
 */
export interface Document {
  /** Primary key; re-indexing the same url replaces the prior version */
  readonly url: Url;
  /** Topic labels in predictor order; duplicates count towards term frequency */
  readonly topics: readonly string[];
  /** Title extracted by the predictor; stored, never searched */
  readonly title?: string;
}

/**
 * How `openIndexStore` treats existing content at the index path
 * - openOrCreate: load the committed index, or create an empty one
 * - flush: destroy existing content and start from an empty index
 */
export type OpenMode = "openOrCreate" | "flush";

export interface OpenIndexOptions {
  /** Default: "openOrCreate" */
  mode?: OpenMode;
}

/**
 * Single posting: a document holding a term and how often
 */
export interface Posting {
  url: Url;
  /** occurrences of the term across the document's topics */
  tf: number;
}

export type UpsertStatus = "added" | "replaced" | "unchanged";

export interface UpsertResult {
  url: Url;
  status: UpsertStatus;
}

export interface CommitResult {
  /** Generation number of the snapshot just written */
  generation: number;
  documents: number;
  terms: number;
}

export interface IndexStats {
  documents: number;
  terms: number;
  /** Total number of (term, url) postings */
  postings: number;
  /** Generation of the last commit seen by this handle */
  generation: number;
  /** Whether the handle holds changes not yet committed (always false for readers) */
  pending: boolean;
}

/**
 * Read-only view over an index, consumed by the query engine
 */
export interface SearchableIndex {
  /** Number of live documents */
  readonly documentCount: number;
  /** Postings for a term, sorted by url; empty when the term is unknown */
  postings(term: Term): readonly Posting[];
  /** Stored fields of a document, if present */
  document(url: Url): Document | undefined;
}

export interface SearchOptions {
  /** Return only the top N urls; absent means no limit */
  maxResults?: number;
}

export interface SearchHit {
  url: Url;
  score: number;
  /** Sum of term frequencies of the matched query terms */
  matchedFrequency: number;
  title?: string;
  topics: readonly string[];
}

/**
 * Entry handed to the indexer by the topic-fetch collaborator
 * Either resolved topics or the reason they could not be resolved.
 */
export type IndexEntry =
  | { url: Url; topics: readonly string[]; title?: string }
  | { url: Url; error: unknown };

export type IndexOutcomeStatus = UpsertStatus | "failed";

export interface IndexOutcome {
  url: Url;
  status: IndexOutcomeStatus;
  /** Failure message when status is "failed" */
  error?: string;
}

export interface IndexingOptions {
  /** Commit after every N successful upserts (default: only at the end) */
  commitEvery?: number;
  /** Invoked after each entry is processed */
  onOutcome?: (outcome: IndexOutcome) => void;
}

export interface IndexingReport {
  /** Documents upserted successfully (added + replaced + unchanged) */
  indexed: number;
  failed: number;
  added: number;
  replaced: number;
  unchanged: number;
  outcomes: IndexOutcome[];
  /** Whether the final commit succeeded */
  committed: boolean;
  /** Generation of the last successful commit, if any */
  generation?: number;
}
