import type { DocId, DocumentInput, DocumentRecord, Outcome, Term } from "../types.js";
import { fail, ok } from "../types.js";
import type { IndexState, IndexStats, IndexStore, PostingsView, TermSample } from "../invertedIndex.js";
import type { Tokenizer } from "../tokenizer.js";
import { SimpleTokenizer, countTerms } from "./simpleTokenizer.js";
import { createLogger, type Logger } from "../../logger.js";

const MOST_COMMON_LIMIT = 10;

export interface MemoryInvertedIndexOptions {
  tokenizer?: Tokenizer;
  now?: () => number;
  logger?: Logger;
}

/**
 * Simple in-memory inverted index.
 *
 * Data structure:
 * - term -> (docId -> raw count)
 * - docId -> record
 * - term -> document frequency
 * - docId -> distinct terms (reverse map so removal touches only the doc's own terms)
 *
 * All maps iterate in insertion order, which `sampleTerms` and snapshots rely on.
 */
export class MemoryInvertedIndex implements IndexStore {
  private readonly termToDocMap = new Map<Term, Map<DocId, number>>();
  private readonly docs = new Map<DocId, DocumentRecord>();
  private readonly termStats = new Map<Term, number>();
  private readonly docTerms = new Map<DocId, Term[]>();
  private totalDocuments = 0;
  private totalTerms = 0;

  private readonly tokenizer: Tokenizer;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: MemoryInvertedIndexOptions = {}) {
    this.tokenizer = options.tokenizer ?? new SimpleTokenizer();
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger("index");
  }

  static fromState(state: IndexState, options: MemoryInvertedIndexOptions = {}): MemoryInvertedIndex {
    const index = new MemoryInvertedIndex(options);

    for (const [term, postings] of state.postings) {
      const docMap = new Map<DocId, number>();
      for (const [docId, count] of postings) {
        docMap.set(docId, count);
        let terms = index.docTerms.get(docId);
        if (!terms) {
          terms = [];
          index.docTerms.set(docId, terms);
        }
        terms.push(term);
      }
      index.termToDocMap.set(term, docMap);
    }
    for (const [docId, record] of state.documents) {
      index.docs.set(docId, { ...record });
    }
    for (const [term, df] of state.termStats) {
      index.termStats.set(term, df);
    }
    index.totalDocuments = state.totalDocuments;
    index.totalTerms = state.totalTerms;

    return index;
  }

  addDocument(input: DocumentInput): Outcome<DocumentRecord> {
    const { id, content } = input;
    if (!content.trim()) {
      this.log.warn(`Empty content for document ${id}`);
      return fail("rejected_input", "content must not be empty");
    }

    // everything is computed before the first map is touched
    const tokens = this.tokenizer.tokenize(content);
    if (tokens.length === 0) {
      this.log.warn(`No indexable terms found for document ${id}`);
      return fail("rejected_input", "content has no indexable terms");
    }
    const counts = countTerms(tokens);
    const record: DocumentRecord = {
      id,
      content,
      title: input.title ?? `Document ${id}`,
      author: input.author ?? null,
      totalTerms: tokens.length,
      uniqueTerms: counts.size,
      addedAt: this.now(),
    };

    for (const [term, count] of counts) {
      let docMap = this.termToDocMap.get(term);
      if (!docMap) {
        docMap = new Map();
        this.termToDocMap.set(term, docMap);
      }
      docMap.set(id, count);
      this.termStats.set(term, (this.termStats.get(term) ?? 0) + 1);
    }
    this.docTerms.set(id, Array.from(counts.keys()));
    this.docs.set(id, record);

    this.totalDocuments++;
    this.totalTerms = this.termToDocMap.size;

    this.log.debug(`Indexed document ${id} with ${tokens.length} tokens`);
    return ok({ ...record });
  }

  removeDocument(docId: DocId): Outcome<DocumentRecord> {
    const record = this.docs.get(docId);
    if (!record) return fail("not_found", `document ${docId} not found`);

    for (const term of this.docTerms.get(docId) ?? []) {
      const docMap = this.termToDocMap.get(term);
      if (!docMap || !docMap.delete(docId)) continue;

      if (docMap.size === 0) {
        this.termToDocMap.delete(term);
        this.termStats.delete(term);
      } else {
        this.termStats.set(term, docMap.size);
      }
    }
    this.docTerms.delete(docId);
    this.docs.delete(docId);

    this.totalDocuments--;
    this.totalTerms = this.termToDocMap.size;

    this.log.debug(`Removed document ${docId}`);
    return ok(record);
  }

  /** Returns a copy; the stored record stays private to the index. */
  getDocument(docId: DocId): DocumentRecord | undefined {
    const record = this.docs.get(docId);
    return record && { ...record };
  }

  hasDocument(docId: DocId): boolean {
    return this.docs.has(docId);
  }

  getPostings(term: Term): PostingsView | undefined {
    return this.termToDocMap.get(term);
  }

  documentFrequency(term: Term): number {
    return this.termStats.get(term) ?? 0;
  }

  clear(): void {
    this.termToDocMap.clear();
    this.docs.clear();
    this.termStats.clear();
    this.docTerms.clear();
    this.totalDocuments = 0;
    this.totalTerms = 0;
    this.log.debug("Index cleared");
  }

  stats(): IndexStats {
    let totalDocumentOccurrences = 0;
    for (const docMap of this.termToDocMap.values()) {
      totalDocumentOccurrences += docMap.size;
    }

    // Array.prototype.sort is stable, so equal frequencies keep insertion order
    const mostCommonTerms = Array.from(this.termStats, ([term, documentFrequency]) => ({ term, documentFrequency }))
      .sort((a, b) => b.documentFrequency - a.documentFrequency)
      .slice(0, MOST_COMMON_LIMIT);

    return {
      totalDocuments: this.totalDocuments,
      totalTerms: this.totalTerms,
      totalDocumentOccurrences,
      averageTermsPerDocument: this.totalTerms / Math.max(this.totalDocuments, 1),
      mostCommonTerms,
    };
  }

  sampleTerms(limit: number): TermSample[] {
    const sample: TermSample[] = [];
    if (!Number.isInteger(limit) || limit <= 0) return sample;

    for (const [term, docMap] of this.termToDocMap) {
      sample.push({ term, postings: Object.fromEntries(docMap) });
      if (sample.length >= limit) break;
    }
    return sample;
  }

  toState(): IndexState {
    return {
      postings: Array.from(this.termToDocMap, ([term, docMap]): [Term, Array<[DocId, number]>] => [term, Array.from(docMap)]),
      documents: Array.from(this.docs, ([docId, record]): [DocId, DocumentRecord] => [docId, { ...record }]),
      termStats: Array.from(this.termStats),
      totalDocuments: this.totalDocuments,
      totalTerms: this.totalTerms,
    };
  }
}
