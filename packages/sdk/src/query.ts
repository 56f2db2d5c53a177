/**
 * Query engine: free-text query -> ranked urls
 *
 * - query text goes through the indexing tokenizer; each distinct term is looked up once
 * - OR semantics: a document matching any term is a candidate
 * - score = Σ tf(term, doc) × ln(N / max(df(term), 1)) over the matched terms
 * - order: score desc, then matched term frequency desc, then url asc
 */

import { InvalidArgumentError } from "./errors.js";
import { compareCodeUnits } from "./format.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import { openIndexReader } from "./store.js";
import { uniqueTerms } from "./tokenizer.js";
import type { SearchableIndex, SearchHit, SearchOptions, Url } from "./types.js";

interface Candidate {
  url: Url;
  score: number;
  matchedFrequency: number;
}

/**
 * Inverse document frequency, with the document frequency clamped to at least 1
 */
export function inverseDocumentFrequency(documentCount: number, documentFrequency: number): number {
  if (documentCount <= 0) return 0;
  return Math.log(documentCount / Math.max(documentFrequency, 1));
}

/**
 * Ranked hits with their scores and stored fields
 * @throws InvalidArgumentError if maxResults is not a non-negative integer
 */
export function searchHits(index: SearchableIndex, queryText: string, options: SearchOptions = {}): SearchHit[] {
  const { maxResults } = options;
  if (maxResults !== undefined && (!Number.isInteger(maxResults) || maxResults < 0)) {
    throw new InvalidArgumentError("maxResults", `must be a non-negative integer, got ${maxResults}`);
  }

  return metrics.measure("search", () => {
    const terms = uniqueTerms(queryText);
    const documentCount = index.documentCount;
    if (terms.length === 0 || documentCount === 0 || maxResults === 0) {
      return [];
    }

    const candidates = new Map<Url, Candidate>();
    for (const term of terms) {
      const postings = index.postings(term);
      if (postings.length === 0) continue;

      const idf = inverseDocumentFrequency(documentCount, postings.length);
      for (const p of postings) {
        let candidate = candidates.get(p.url);
        if (!candidate) {
          candidate = { url: p.url, score: 0, matchedFrequency: 0 };
          candidates.set(p.url, candidate);
        }
        candidate.score += p.tf * idf;
        candidate.matchedFrequency += p.tf;
      }
    }

    const ranked = Array.from(candidates.values()).sort(compareCandidates);
    const top = maxResults === undefined ? ranked : ranked.slice(0, maxResults);

    logger.debug("query.search", {
      message: queryText,
      details: { terms, candidates: candidates.size, returned: top.length },
    });

    return top.map((c): SearchHit => {
      const doc = index.document(c.url);
      const hit: SearchHit = {
        url: c.url,
        score: c.score,
        matchedFrequency: c.matchedFrequency,
        topics: doc?.topics ?? [],
      };
      if (doc?.title !== undefined) {
        hit.title = doc.title;
      }
      return hit;
    });
  });
}

/**
 * Ranked urls for a free-text query
 * An empty query or one that matches nothing yields an empty list.
 */
export function search(index: SearchableIndex, queryText: string, options: SearchOptions = {}): Url[] {
  return searchHits(index, queryText, options).map((hit) => hit.url);
}

/**
 * Open the committed index at a path, search it, and close it again
 * @throws IndexUnavailableError if the index is missing or corrupt
 */
export async function searchIndex(
  indexPath: string,
  queryText: string,
  options: SearchOptions = {}
): Promise<SearchHit[]> {
  const reader = await openIndexReader(indexPath);
  try {
    return searchHits(reader, queryText, options);
  } finally {
    reader.close();
  }
}

function compareCandidates(a: Candidate, b: Candidate): number {
  return b.score - a.score || b.matchedFrequency - a.matchedFrequency || compareCodeUnits(a.url, b.url);
}
