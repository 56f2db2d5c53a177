/**
 * Committed index snapshot: on-disk format of `<index>/index.json`
 *
 * Documents are authoritative; postings are stored alongside so the file can be
 * inspected on its own, and are checked against the documents on load.
 *
 * Urls and terms are stored as tuple heads, never as object keys: a url such as
 * "__proto__" must round-trip like any other.
 */

import { z } from "zod";
import { makeDocument } from "./document.js";
import { IndexUnavailableError, InvalidDocumentError } from "./errors.js";
import { compareCodeUnits, stableStringify } from "./format.js";
import { InvertedIndex } from "./inverted-index.js";

export const SNAPSHOT_FILE = "index.json";
export const SNAPSHOT_FORMAT = "topicsearch-index";
export const SNAPSHOT_VERSION = 2;

const StoredDocumentSchema = z.object({
  topics: z.array(z.string()),
  title: z.string().optional(),
});

const PostingSchema = z.tuple([z.string().min(1), z.number().int().positive()]);
const DocumentEntrySchema = z.tuple([z.string().min(1), StoredDocumentSchema]);
const TermEntrySchema = z.tuple([z.string().min(1), z.array(PostingSchema)]);

export const SnapshotSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  version: z.literal(SNAPSHOT_VERSION),
  generation: z.number().int().nonnegative(),
  committedAt: z.string(),
  documents: z.array(DocumentEntrySchema),
  postings: z.array(TermEntrySchema),
});

export type SnapshotFile = z.infer<typeof SnapshotSchema>;
type DocumentEntry = z.infer<typeof DocumentEntrySchema>;
type TermEntry = z.infer<typeof TermEntrySchema>;

export interface DecodedSnapshot {
  index: InvertedIndex;
  generation: number;
  committedAt: string;
}

/**
 * Serialize an index as a snapshot file body
 */
export function encodeSnapshot(index: InvertedIndex, generation: number, committedAt: Date): string {
  const documents: SnapshotFile["documents"] = index.documents().map((doc): DocumentEntry => [
    doc.url,
    doc.title === undefined ? { topics: [...doc.topics] } : { topics: [...doc.topics], title: doc.title },
  ]);

  const postings: SnapshotFile["postings"] = index
    .terms()
    .map((term): TermEntry => [term, index.postings(term).map((p): [string, number] => [p.url, p.tf])]);

  const snapshot: SnapshotFile = {
    format: SNAPSHOT_FORMAT,
    version: SNAPSHOT_VERSION,
    generation,
    committedAt: committedAt.toISOString(),
    documents,
    postings,
  };

  return stableStringify(snapshot, 0);
}

/**
 * Parse and verify a snapshot file body
 * @param indexPath - Index directory, used in error messages
 * @throws IndexUnavailableError if the content is not a consistent snapshot
 */
export function decodeSnapshot(content: string, indexPath: string): DecodedSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new IndexUnavailableError(indexPath, "corrupt snapshot", { cause: err });
  }

  const parsed = SnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue";
    throw new IndexUnavailableError(indexPath, `invalid snapshot (${where})`, { cause: parsed.error });
  }

  const snapshot = parsed.data;
  const index = new InvertedIndex();
  for (const [url, stored] of snapshot.documents) {
    if (index.has(url)) {
      throw new IndexUnavailableError(indexPath, `duplicate document ${url}`);
    }
    try {
      index.put(makeDocument(url, stored.topics, { title: stored.title }));
    } catch (err) {
      if (err instanceof InvalidDocumentError) {
        throw new IndexUnavailableError(indexPath, `invalid document ${url}`, { cause: err });
      }
      throw err;
    }
  }

  verifyPostings(index, snapshot.postings, indexPath);

  return { index, generation: snapshot.generation, committedAt: snapshot.committedAt };
}

/**
 * Stored postings must be exactly the postings rebuilt from the documents
 */
function verifyPostings(index: InvertedIndex, stored: SnapshotFile["postings"], indexPath: string): void {
  const storedTerms = new Set(stored.map(([term]) => term));
  if (storedTerms.size !== stored.length || storedTerms.size !== index.termCount) {
    throw new IndexUnavailableError(indexPath, "inconsistent postings (term count)");
  }

  for (const [term, entries] of stored) {
    const expected = index.postings(term);
    const actual = [...entries].sort(([a], [b]) => compareCodeUnits(a, b));
    const consistent =
      expected.length === actual.length &&
      expected.every((p, i) => {
        const entry = actual[i];
        return entry !== undefined && entry[0] === p.url && entry[1] === p.tf;
      });
    if (!consistent) {
      throw new IndexUnavailableError(indexPath, `inconsistent postings for term "${term}"`);
    }
  }
}
