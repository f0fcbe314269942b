export * from "./types.js";
export type { Tokenizer } from "./tokenizer.js";
export type { IndexReader, IndexState, IndexStats, IndexStore, PostingsView, TermSample } from "./invertedIndex.js";
export type { Ranker, RankContext, RankOptions } from "./ranker.js";
export type { LoadSource, LoadedSnapshot, SnapshotInfo, SnapshotStore } from "./persistence.js";
export { IndexSnapshotSchema, SNAPSHOT_VERSION, emptyState, fromSnapshot, parseSnapshot, toSnapshot, type IndexSnapshot } from "./snapshot.js";
export { ReadWriteLock } from "./rwLock.js";
export * from "./impl/index.js";

import { FileSnapshotStore } from "./impl/fileSnapshotStore.js";
import { MemorySearchEngine } from "./impl/memorySearchEngine.js";
import { SimpleTokenizer } from "./impl/simpleTokenizer.js";
import { TermFrequencyRanker } from "./impl/termFrequencyRanker.js";
import type { Logger } from "../logger.js";

export interface CreateEngineOptions {
  dataDir: string;
  backupRetention?: number;
  stopWords?: ReadonlySet<string>;
  logger?: Logger;
}

/** Wires the default tokenizer, ranker and file-backed snapshots into one engine. */
export function createSearchEngine(options: CreateEngineOptions): MemorySearchEngine {
  const tokenizer = new SimpleTokenizer(options.stopWords);
  return new MemorySearchEngine({
    tokenizer,
    ranker: new TermFrequencyRanker(),
    snapshots: new FileSnapshotStore({ dataDir: options.dataDir, retention: options.backupRetention, logger: options.logger }),
    logger: options.logger,
  });
}
