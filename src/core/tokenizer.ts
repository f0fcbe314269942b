import type { Term } from "./types.js";

/**
 * Turns text into terms.
 *
 * Contract notes:
 * - deterministic for a given input, independent of any index state
 * - order is preserved and repeats are kept (callers count occurrences)
 * - blank input yields an empty array
 */
export interface Tokenizer {
  tokenize(text: string): Term[];
}
