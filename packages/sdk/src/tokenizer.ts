/**
 * Topic tokenizer
 *
 * The same policy runs at indexing and at query time; a term produced on one
 * side and not the other can never match.
 *
 * Policy:
 * - normalize to NFC, so composed and decomposed spellings agree
 * - split on runs of characters that are neither Unicode letters, marks nor digits
 * - lower-case every piece
 * - drop empty pieces
 */

import type { Term } from "./types.js";

const SEPARATOR = /[^\p{L}\p{M}\p{N}]+/u;

/**
 * Tokenize text into terms, keeping order and duplicates
 */
export function tokenize(text: string): Term[] {
  const terms: Term[] = [];
  for (const piece of text.normalize("NFC").split(SEPARATOR)) {
    if (piece.length === 0) continue;
    terms.push(piece.toLowerCase().normalize("NFC"));
  }
  return terms;
}

/**
 * Distinct terms of a text in first-occurrence order
 */
export function uniqueTerms(text: string): Term[] {
  return Array.from(new Set(tokenize(text)));
}
