/**
 * In-memory inverted index: the working state behind store and reader handles
 *
 * Data structure:
 * - term -> (url -> tf)
 * - url -> { document, term frequencies }
 *
 * Keeping each document's term frequencies lets a replace touch only the terms
 * the old and new versions actually carry.
 */

import { termFrequencies } from "./document.js";
import { compareCodeUnits } from "./format.js";
import type { Document, Posting, SearchableIndex, Term, UpsertStatus, Url } from "./types.js";

interface StoredDocument {
  doc: Document;
  terms: Map<Term, number>;
}

export class InvertedIndex implements SearchableIndex {
  readonly #termToDocs = new Map<Term, Map<Url, number>>();
  readonly #docs = new Map<Url, StoredDocument>();
  #postingCount = 0;

  get documentCount(): number {
    return this.#docs.size;
  }

  get termCount(): number {
    return this.#termToDocs.size;
  }

  get postingCount(): number {
    return this.#postingCount;
  }

  /**
   * Add or replace a document
   * Term frequencies are computed before anything is mutated, so the swap from
   * old to new postings happens in one synchronous step.
   */
  put(doc: Document): UpsertStatus {
    const terms = termFrequencies(doc);
    const previous = this.#docs.get(doc.url);

    if (previous && sameDocument(previous.doc, doc)) {
      return "unchanged";
    }

    if (previous) {
      this.#unlink(doc.url, previous.terms);
    }

    for (const [term, tf] of terms) {
      let docMap = this.#termToDocs.get(term);
      if (!docMap) {
        docMap = new Map();
        this.#termToDocs.set(term, docMap);
      }
      docMap.set(doc.url, tf);
      this.#postingCount++;
    }
    this.#docs.set(doc.url, { doc, terms });

    return previous ? "replaced" : "added";
  }

  /**
   * Remove a document and all of its postings
   * @returns false when the url is not indexed
   */
  remove(url: Url): boolean {
    const previous = this.#docs.get(url);
    if (!previous) return false;

    this.#unlink(url, previous.terms);
    this.#docs.delete(url);
    return true;
  }

  has(url: Url): boolean {
    return this.#docs.has(url);
  }

  document(url: Url): Document | undefined {
    return this.#docs.get(url)?.doc;
  }

  /**
   * Postings sorted by url
   */
  postings(term: Term): Posting[] {
    const docMap = this.#termToDocs.get(term);
    if (!docMap) return [];

    const postings: Posting[] = [];
    for (const [url, tf] of docMap) {
      postings.push({ url, tf });
    }
    postings.sort((a, b) => compareCodeUnits(a.url, b.url));
    return postings;
  }

  /**
   * All indexed documents, sorted by url
   */
  documents(): Document[] {
    return Array.from(this.#docs.values(), (entry) => entry.doc).sort((a, b) =>
      compareCodeUnits(a.url, b.url)
    );
  }

  /**
   * All terms, sorted
   */
  terms(): Term[] {
    return Array.from(this.#termToDocs.keys()).sort(compareCodeUnits);
  }

  #unlink(url: Url, terms: Map<Term, number>): void {
    for (const term of terms.keys()) {
      const docMap = this.#termToDocs.get(term);
      if (!docMap || !docMap.delete(url)) continue;
      this.#postingCount--;
      if (docMap.size === 0) {
        this.#termToDocs.delete(term);
      }
    }
  }
}

function sameDocument(a: Document, b: Document): boolean {
  if (a.title !== b.title || a.topics.length !== b.topics.length) {
    return false;
  }
  return a.topics.every((topic, i) => topic === b.topics[i]);
}
