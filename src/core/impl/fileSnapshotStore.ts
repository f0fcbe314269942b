import { copyFile, mkdir, open, readFile, readdir, rename, rm, stat } from "node:fs/promises";
import path from "node:path";

import type { Outcome } from "../types.js";
import { fail, ok } from "../types.js";
import type { IndexState } from "../invertedIndex.js";
import type { LoadedSnapshot, SnapshotInfo, SnapshotStore } from "../persistence.js";
import { emptyState, fromSnapshot, parseSnapshot, toSnapshot } from "../snapshot.js";
import { createLogger, type Logger } from "../../logger.js";

const BACKUP_PREFIX = "index_backup_";
const BACKUP_PATTERN = /^index_backup_\d{8}_\d{6}_\d{3}(?:_\d+)?\.json$/;
const BYTES_PER_MB = 1024 * 1024;

export interface FileSnapshotStoreOptions {
  dataDir: string;
  /** canonical snapshot file name inside dataDir */
  fileName?: string;
  /** number of backups kept after each save */
  retention?: number;
  now?: () => Date;
  logger?: Logger;
}

interface BackupFile {
  name: string;
  path: string;
  mtimeMs: number;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** YYYYMMDD_HHMMSS_mmm in UTC */
export function backupStamp(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `${date}_${time}_${pad(at.getUTCMilliseconds(), 3)}`;
}

/**
 * Snapshot store on the local filesystem.
 *
 * Layout:
 * - `<dataDir>/index.json` canonical snapshot
 * - `<dataDir>/backups/index_backup_<stamp>[_n].json` previous snapshots, newest `retention` kept
 *
 * Saves write a temp file next to the snapshot, fsync it and rename it over the
 * canonical path.
 */
export class FileSnapshotStore implements SnapshotStore {
  readonly snapshotPath: string;
  readonly backupDir: string;

  private readonly retention: number;
  private readonly now: () => Date;
  private readonly log: Logger;
  private tempSeq = 0;

  constructor(options: FileSnapshotStoreOptions) {
    this.snapshotPath = path.join(options.dataDir, options.fileName ?? "index.json");
    this.backupDir = path.join(options.dataDir, "backups");
    this.retention = options.retention ?? 5;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger("storage");
  }

  async save(state: IndexState): Promise<Outcome<{ savedAt: string }>> {
    const at = this.now();
    const savedAt = at.toISOString();
    const tempPath = `${this.snapshotPath}.tmp.${process.pid}.${++this.tempSeq}`;

    try {
      await mkdir(this.backupDir, { recursive: true });
      if (await this.snapshotExists()) {
        await this.createBackup(at);
      }

      const data = JSON.stringify(toSnapshot(state, savedAt));
      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(data, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, this.snapshotPath);
    } catch (err) {
      this.log.error(`Error saving index: ${errorMessage(err)}`);
      await this.removeTemp(tempPath);
      return fail("persistence_failure", `failed to save snapshot: ${errorMessage(err)}`, err);
    }

    this.log.info(`Index saved to ${this.snapshotPath} (${state.totalDocuments} documents)`);
    return ok({ savedAt });
  }

  async load(): Promise<Outcome<LoadedSnapshot>> {
    let raw: string;
    try {
      raw = await readFile(this.snapshotPath, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        this.log.info("No existing index found, starting empty");
        return ok({ state: emptyState(), source: "empty", savedAt: null });
      }
      this.log.error(`Error reading index: ${errorMessage(err)}`);
      return this.restoreFromBackup();
    }

    const parsed = parseSnapshot(raw);
    if (!parsed.ok) {
      this.log.error(`Snapshot ${this.snapshotPath} is corrupt: ${parsed.reason}`);
      return this.restoreFromBackup();
    }

    this.log.info(
      `Index loaded from ${this.snapshotPath}: ${parsed.snapshot.total_documents} documents, ${parsed.snapshot.total_terms} terms`,
    );
    return ok({ state: fromSnapshot(parsed.snapshot), source: "snapshot", savedAt: parsed.snapshot.saved_at });
  }

  /** Tries backups newest first; the first one that parses wins. */
  async restoreFromBackup(): Promise<Outcome<LoadedSnapshot>> {
    let backups: BackupFile[];
    try {
      backups = await this.listBackups();
    } catch (err) {
      return fail("persistence_failure", `cannot list backups: ${errorMessage(err)}`, err);
    }
    if (backups.length === 0) {
      this.log.warn("No backup files found");
      return fail("persistence_failure", "snapshot is unreadable and no backups exist");
    }

    for (const backup of backups) {
      this.log.info(`Attempting to restore from backup: ${backup.name}`);
      let raw: string;
      try {
        raw = await readFile(backup.path, "utf8");
      } catch (err) {
        this.log.error(`Cannot read backup ${backup.name}: ${errorMessage(err)}`);
        continue;
      }
      const parsed = parseSnapshot(raw);
      if (!parsed.ok) {
        this.log.error(`Backup ${backup.name} is corrupt: ${parsed.reason}`);
        continue;
      }

      this.log.success(`Restored index from backup ${backup.name}`);
      return ok({ state: fromSnapshot(parsed.snapshot), source: "backup", savedAt: parsed.snapshot.saved_at });
    }

    return fail("persistence_failure", `snapshot is unreadable and all ${backups.length} backups failed`);
  }

  async info(): Promise<SnapshotInfo> {
    const info: SnapshotInfo = { exists: false, sizeBytes: 0, sizeMb: 0, lastModified: null, backupCount: 0 };

    try {
      const st = await stat(this.snapshotPath);
      info.exists = true;
      info.sizeBytes = st.size;
      info.sizeMb = st.size / BYTES_PER_MB;
      info.lastModified = st.mtime.toISOString();
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }

    info.backupCount = (await this.listBackups()).length;
    return info;
  }

  async deleteAll(): Promise<Outcome<{ removed: number }>> {
    let removed = 0;
    try {
      if (await this.snapshotExists()) {
        await rm(this.snapshotPath);
        removed++;
        this.log.info("Main index file deleted");
      }
      for (const backup of await this.listBackups()) {
        await rm(backup.path);
        removed++;
        this.log.debug(`Backup file deleted: ${backup.name}`);
      }
    } catch (err) {
      this.log.error(`Error deleting index: ${errorMessage(err)}`);
      return fail("persistence_failure", `failed to delete snapshot files: ${errorMessage(err)}`, err);
    }
    return ok({ removed });
  }

  /** Backups sorted newest first by mtime, then by name. */
  async listBackups(): Promise<BackupFile[]> {
    let names: string[];
    try {
      names = await readdir(this.backupDir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const backups: BackupFile[] = [];
    for (const name of names) {
      if (!BACKUP_PATTERN.test(name)) continue;
      const full = path.join(this.backupDir, name);
      const st = await stat(full);
      backups.push({ name, path: full, mtimeMs: st.mtimeMs });
    }

    backups.sort((a, b) => b.mtimeMs - a.mtimeMs || (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));
    return backups;
  }

  private async createBackup(at: Date): Promise<void> {
    try {
      const target = await this.freeBackupPath(at);
      await copyFile(this.snapshotPath, target);
      this.log.debug(`Backup created: ${path.basename(target)}`);
      await this.pruneBackups();
    } catch (err) {
      // a missed backup must not block the save itself
      this.log.warn(`Error creating backup: ${errorMessage(err)}`);
    }
  }

  private async pruneBackups(): Promise<void> {
    const backups = await this.listBackups();
    for (const old of backups.slice(this.retention)) {
      await rm(old.path, { force: true });
      this.log.debug(`Removed old backup: ${old.name}`);
    }
  }

  private async freeBackupPath(at: Date): Promise<string> {
    const base = `${BACKUP_PREFIX}${backupStamp(at)}`;
    let candidate = path.join(this.backupDir, `${base}.json`);
    for (let n = 1; await this.fileExists(candidate); n++) {
      candidate = path.join(this.backupDir, `${base}_${n}.json`);
    }
    return candidate;
  }

  private snapshotExists(): Promise<boolean> {
    return this.fileExists(this.snapshotPath);
  }

  private async fileExists(file: string): Promise<boolean> {
    try {
      await stat(file);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (err) {
      this.log.warn(`Could not remove temp file ${tempPath}: ${errorMessage(err)}`);
    }
  }
}
