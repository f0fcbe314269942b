import type { DocId, DocumentInput, DocumentRecord, Outcome, SearchHit } from "../types.js";
import { fail, ok } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { IndexState, IndexStats, IndexStore, TermSample } from "../invertedIndex.js";
import type { Ranker } from "../ranker.js";
import type { LoadSource, SnapshotInfo, SnapshotStore } from "../persistence.js";
import { ReadWriteLock } from "../rwLock.js";
import { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
import { createLogger, type Logger } from "../../logger.js";

export interface EngineDeps {
  tokenizer: Tokenizer;
  ranker: Ranker;
  snapshots: SnapshotStore;
  /** clock for document timestamps */
  now?: () => number;
  logger?: Logger;
}

export interface LoadSummary {
  source: LoadSource;
  totalDocuments: number;
  savedAt: string | null;
}

/**
 * Owns one index and serves every core operation against it.
 *
 * Reads (search, lookups, stats) share a read-write lock; mutations and
 * loads hold it exclusively. Saves copy the index state under the read side
 * and then write it under a second lock that serializes all snapshot I/O.
 *
 * Lifecycle: `start()` loads the last snapshot, `stop()` saves one.
 */
export class MemorySearchEngine {
  private index: IndexStore;
  private readonly lock = new ReadWriteLock();
  private readonly persistLock = new ReadWriteLock();
  private readonly log: Logger;

  constructor(private readonly deps: EngineDeps) {
    this.log = deps.logger ?? createLogger("engine");
    this.index = this.createIndex();
  }

  async start(): Promise<Outcome<LoadSummary>> {
    const loaded = await this.load();
    if (loaded.ok) {
      this.log.info(`Engine started from ${loaded.value.source}: ${loaded.value.totalDocuments} documents`);
    }
    return loaded;
  }

  async stop(): Promise<Outcome<{ savedAt: string }>> {
    this.log.info("Saving index before shutdown");
    return this.save();
  }

  /**
   * Adds a new document. An id that is already indexed is a `conflict`;
   * replace a document by removing it first.
   */
  addDocument(input: DocumentInput): Promise<Outcome<DocumentRecord>> {
    if (!input.id.trim()) {
      return Promise.resolve(fail("rejected_input", "id must not be empty"));
    }
    return this.lock.write(() => {
      if (this.index.hasDocument(input.id)) {
        return fail("conflict", `document ${input.id} already exists`);
      }
      return this.index.addDocument(input);
    });
  }

  removeDocument(docId: DocId): Promise<Outcome<DocumentRecord>> {
    return this.lock.write(() => this.index.removeDocument(docId));
  }

  getDocument(docId: DocId): Promise<DocumentRecord | undefined> {
    return this.lock.read(() => this.index.getDocument(docId));
  }

  hasDocument(docId: DocId): Promise<boolean> {
    return this.lock.read(() => this.index.hasDocument(docId));
  }

  /**
   * Ranks documents for a free-text query (OR of its terms).
   * A blank query is rejected; a query made only of stop words matches nothing.
   */
  search(rawQuery: string, limit: number): Promise<Outcome<SearchHit[]>> {
    if (!rawQuery.trim()) {
      return Promise.resolve(fail("rejected_input", "query must not be empty"));
    }
    if (!Number.isInteger(limit) || limit < 1) {
      return Promise.resolve(fail("rejected_input", "limit must be a positive integer"));
    }

    return this.lock.read(() => {
      const started = performance.now();
      const queryTerms = this.deps.tokenizer.tokenize(rawQuery);
      const hits = this.deps.ranker.rank(queryTerms, { index: this.index }, { limit });
      this.log.debug(`Search completed in ${(performance.now() - started).toFixed(2)}ms, found ${hits.length} results`);
      return ok(hits);
    });
  }

  stats(): Promise<IndexStats> {
    return this.lock.read(() => this.index.stats());
  }

  sampleTerms(limit: number): Promise<TermSample[]> {
    return this.lock.read(() => this.index.sampleTerms(limit));
  }

  clear(): Promise<void> {
    return this.lock.write(() => {
      this.index.clear();
      this.log.info("Index cleared");
    });
  }

  async save(): Promise<Outcome<{ savedAt: string }>> {
    const state = await this.lock.read(() => this.index.toState());
    return this.persistLock.write(() => this.deps.snapshots.save(state));
  }

  /** Replaces the in-memory index with the stored one. On failure the current index is kept. */
  load(): Promise<Outcome<LoadSummary>> {
    return this.persistLock.write(async () => {
      const loaded = await this.deps.snapshots.load();
      if (!loaded.ok) {
        this.log.error(`Index could not be loaded: ${loaded.error.message}`);
        return loaded;
      }

      const { state, source, savedAt } = loaded.value;
      await this.lock.write(() => {
        this.index = this.createIndex(state);
      });
      return ok({ source, totalDocuments: state.totalDocuments, savedAt });
    });
  }

  info(): Promise<SnapshotInfo> {
    return this.persistLock.read(() => this.deps.snapshots.info());
  }

  deleteAll(): Promise<Outcome<{ removed: number }>> {
    return this.persistLock.write(() => this.deps.snapshots.deleteAll());
  }

  private createIndex(state?: IndexState): IndexStore {
    const options = { tokenizer: this.deps.tokenizer, now: this.deps.now, logger: this.deps.logger };
    return state ? MemoryInvertedIndex.fromState(state, options) : new MemoryInvertedIndex(options);
  }
}
