import type { DocId, DocumentRecord, SearchHit, Term } from "../types.js";
import type { RankContext, RankOptions, Ranker } from "../ranker.js";

export function termFrequency(count: number, totalTerms: number): number {
  return totalTerms === 0 ? 0 : count / totalTerms;
}

/** Score descending, then docId ascending so equal scores have a fixed order. */
export function compareHits(a: SearchHit, b: SearchHit): number {
  return b.score - a.score || (a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0);
}

/**
 * Bag-of-words term-frequency ranker:
 * - candidates are the union of the query terms' postings (OR semantics)
 * - each query term occurrence adds count / docLength for every doc holding it,
 *   so a term repeated in the query is counted again
 * - no IDF weighting
 */
export class TermFrequencyRanker implements Ranker {
  rank(queryTerms: Term[], ctx: RankContext, options?: RankOptions): SearchHit[] {
    if (queryTerms.length === 0) return [];

    const scores = new Map<DocId, number>();
    const docs = new Map<DocId, DocumentRecord | undefined>();
    for (const term of queryTerms) {
      const postings = ctx.index.getPostings(term);
      if (!postings) continue;

      for (const [docId, count] of postings) {
        let doc = docs.get(docId);
        if (!docs.has(docId)) {
          doc = ctx.index.getDocument(docId);
          docs.set(docId, doc);
        }
        const tf = doc ? termFrequency(count, doc.totalTerms) : 0;
        scores.set(docId, (scores.get(docId) ?? 0) + tf);
      }
    }

    const hits: SearchHit[] = [];
    for (const [docId, score] of scores) {
      const document = docs.get(docId);
      if (document) hits.push({ docId, score, document });
    }

    hits.sort(compareHits);
    return options?.limit === undefined ? hits : hits.slice(0, Math.max(options.limit, 0));
  }
}
