import type { Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set([
  "the",
  "a",
  "an",
  "and",
  "or",
  "but",
  "in",
  "on",
  "at",
  "to",
  "for",
  "of",
  "with",
  "by",
]);

// anything that is not a word character (letter, mark, digit, connector) or whitespace
const NON_WORD = /[^\p{L}\p{M}\p{N}\p{Pc}\s]/gu;
const WHITESPACE = /\s+/;

/**
 * Unicode-aware tokenizer:
 * - lowercases
 * - deletes punctuation outright ("don't" -> "dont"), it does not split on it
 * - splits on whitespace
 * - removes stop words
 */
export class SimpleTokenizer implements Tokenizer {
  private readonly stopWords: ReadonlySet<string>;

  constructor(stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS) {
    this.stopWords = stopWords;
  }

  tokenize(text: string): Term[] {
    if (!text.trim()) return [];

    const normalized = text.toLowerCase().replace(NON_WORD, "");
    const terms: Term[] = [];
    for (const token of normalized.split(WHITESPACE)) {
      if (token && !this.stopWords.has(token)) terms.push(token);
    }
    return terms;
  }
}

/** Raw occurrence count per distinct term, in first-seen order. */
export function countTerms(terms: Iterable<Term>): Map<Term, number> {
  const counts = new Map<Term, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}
