/** Shared core types used by module contracts. */

export type DocId = string;
export type Term = string;

/** Caller-supplied document, before indexing. */
export interface DocumentInput {
  id: DocId;
  content: string;
  title?: string;
  author?: string;
}

/**
 * Stored form of an indexed document. Owned by the index store and never
 * mutated in place; replacing a document means remove-then-add.
 */
export interface DocumentRecord {
  readonly id: DocId;
  readonly content: string;
  readonly title: string;
  readonly author: string | null;
  /** token count after stopword filtering */
  readonly totalTerms: number;
  readonly uniqueTerms: number;
  /** epoch millis */
  readonly addedAt: number;
}

export interface SearchHit {
  docId: DocId;
  score: number;
  document: DocumentRecord;
}

export interface TermFrequency {
  term: Term;
  documentFrequency: number;
}

export type ErrorKind = "rejected_input" | "not_found" | "conflict" | "persistence_failure";

export interface CoreError {
  kind: ErrorKind;
  message: string;
  cause?: unknown;
}

/** Result of a core operation. Expected failures are values, not exceptions. */
export type Outcome<T> = { ok: true; value: T } | { ok: false; error: CoreError };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string, cause?: unknown): Outcome<T> {
  return cause === undefined ? { ok: false, error: { kind, message } } : { ok: false, error: { kind, message, cause } };
}
