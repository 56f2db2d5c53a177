/**
 * Document model
 *
 * A Document is a transient value handed to the store; the store copies what it
 * needs and never keeps a reference to the caller's object.
 */

import { InvalidDocumentError } from "./errors.js";
import { tokenize } from "./tokenizer.js";
import type { Document, Term } from "./types.js";

/**
 * Build a document from a url and its predicted topics
 * @param url - Non-empty url identifying the document
 * @param topics - Topic labels; may be empty (the document then matches nothing)
 * @param options - Optional stored title
 * @throws InvalidDocumentError if the url is empty or the fields have the wrong shape
 */
export function makeDocument(
  url: string,
  topics: readonly string[],
  options: { title?: string } = {}
): Document {
  if (typeof url !== "string" || url.trim().length === 0) {
    throw new InvalidDocumentError(String(url), "url must be a non-empty string");
  }

  // Callers outside TypeScript (parsed JSON, API replies) can hand us anything
  const rawTopics: unknown = topics;
  if (!Array.isArray(rawTopics)) {
    throw new InvalidDocumentError(url, "topics must be an array of strings");
  }
  const copied: string[] = [];
  rawTopics.forEach((topic: unknown, i) => {
    if (typeof topic !== "string") {
      throw new InvalidDocumentError(url, `topic at index ${i} is not a string`);
    }
    copied.push(topic);
  });

  const rawTitle: unknown = options.title;
  if (rawTitle !== undefined && typeof rawTitle !== "string") {
    throw new InvalidDocumentError(url, "title must be a string");
  }

  const doc: Document =
    rawTitle === undefined
      ? { url, topics: Object.freeze(copied) }
      : { url, topics: Object.freeze(copied), title: rawTitle };
  return Object.freeze(doc);
}

/**
 * Count term occurrences across all topics of a document
 */
export function termFrequencies(doc: Document): Map<Term, number> {
  const freqs = new Map<Term, number>();
  for (const topic of doc.topics) {
    for (const term of tokenize(topic)) {
      freqs.set(term, (freqs.get(term) ?? 0) + 1);
    }
  }
  return freqs;
}
