export { SimpleTokenizer, DEFAULT_STOP_WORDS, countTerms } from "./simpleTokenizer.js";
export { MemoryInvertedIndex, type MemoryInvertedIndexOptions } from "./memoryInvertedIndex.js";
export { TermFrequencyRanker, compareHits, termFrequency } from "./termFrequencyRanker.js";
export { FileSnapshotStore, backupStamp, type FileSnapshotStoreOptions } from "./fileSnapshotStore.js";
export { MemorySearchEngine, type EngineDeps, type LoadSummary } from "./memorySearchEngine.js";
