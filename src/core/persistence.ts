import type { Outcome } from "./types.js";
import type { IndexState } from "./invertedIndex.js";

export interface SnapshotInfo {
  exists: boolean;
  sizeBytes: number;
  sizeMb: number;
  /** ISO-8601, null when no snapshot exists */
  lastModified: string | null;
  backupCount: number;
}

/** Where a loaded index came from. `empty` means no snapshot was ever written. */
export type LoadSource = "empty" | "snapshot" | "backup";

export interface LoadedSnapshot {
  state: IndexState;
  source: LoadSource;
  savedAt: string | null;
}

/**
 * Durable storage for index snapshots.
 *
 * Contract notes:
 * - `save` replaces the snapshot atomically: readers see the old or the new
 *   file, never a partial one
 * - a failed `load` is distinct from an empty start: it is only returned when
 *   the snapshot and every backup are unusable
 */
export interface SnapshotStore {
  save(state: IndexState): Promise<Outcome<{ savedAt: string }>>;
  load(): Promise<Outcome<LoadedSnapshot>>;
  info(): Promise<SnapshotInfo>;
  deleteAll(): Promise<Outcome<{ removed: number }>>;
}
