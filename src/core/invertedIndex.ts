import type { DocId, DocumentInput, DocumentRecord, Outcome, Term, TermFrequency } from "./types.js";

/** term -> (docId -> raw count); read-only view handed to rankers. */
export type PostingsView = ReadonlyMap<DocId, number>;

export interface IndexStats {
  totalDocuments: number;
  totalTerms: number;
  /** sum of posting-list sizes across all terms */
  totalDocumentOccurrences: number;
  /** distinct terms divided by max(documents, 1) */
  averageTermsPerDocument: number;
  /** top 10 by document frequency, ties in term insertion order */
  mostCommonTerms: TermFrequency[];
}

export interface TermSample {
  term: Term;
  /** docId -> raw count */
  postings: Record<DocId, number>;
}

/**
 * Plain data shape of a whole index, in insertion order.
 * This is what the persistence layer reads and writes; it carries no behavior.
 */
export interface IndexState {
  postings: Array<[Term, Array<[DocId, number]>]>;
  documents: Array<[DocId, DocumentRecord]>;
  termStats: Array<[Term, number]>;
  totalDocuments: number;
  totalTerms: number;
}

/** Read side of the index, enough to rank a query. */
export interface IndexReader {
  getPostings(term: Term): PostingsView | undefined;
  getDocument(docId: DocId): DocumentRecord | undefined;
}

/**
 * Inverted index owning postings, document records and term statistics.
 *
 * Contract notes:
 * - `addDocument` does not check id uniqueness; adding an id twice without
 *   removing it first corrupts document frequencies, so callers check first
 * - a document's postings are applied all-or-nothing
 * - terms whose document frequency reaches zero are pruned immediately
 */
export interface IndexStore extends IndexReader {
  addDocument(input: DocumentInput): Outcome<DocumentRecord>;
  removeDocument(docId: DocId): Outcome<DocumentRecord>;
  hasDocument(docId: DocId): boolean;

  clear(): void;

  stats(): IndexStats;
  sampleTerms(limit: number): TermSample[];
  documentFrequency(term: Term): number;

  toState(): IndexState;
}
