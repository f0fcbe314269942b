import type { SearchHit, Term } from "./types.js";
import type { IndexReader } from "./invertedIndex.js";

export interface RankOptions {
  /** Truncate to this many hits. Applied after sorting, never before. */
  limit?: number;
}

export interface RankContext {
  index: IndexReader;
}

/**
 * Scores documents for already-tokenized query terms.
 *
 * Scores are only comparable within one call; there is no cross-query
 * normalization.
 */
export interface Ranker {
  rank(queryTerms: Term[], ctx: RankContext, options?: RankOptions): SearchHit[];
}
