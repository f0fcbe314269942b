import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { FileSnapshotStore, MemoryInvertedIndex, type IndexState } from "../../index.js";

const crash = vi.hoisted(() => ({ beforeRename: false }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    rename: async (from: string, to: string) => {
      if (crash.beforeRename) throw new Error("simulated crash between write and rename");
      return actual.rename(from, to);
    },
  };
});

function stateOf(...contents: string[]): IndexState {
  const index = new MemoryInvertedIndex({ now: () => 1 });
  contents.forEach((content, i) => index.addDocument({ id: `d${i + 1}`, content }));
  return index.toState();
}

describe("FileSnapshotStore atomic replace", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "termindex-atomic-"));
    crash.beforeRename = false;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("keeps the previous snapshot intact when the rename never happens", async () => {
    const store = new FileSnapshotStore({ dataDir: dir });
    const first = stateOf("apple banana");
    expect((await store.save(first)).ok).toBe(true);
    const before = readFileSync(store.snapshotPath, "utf8");

    crash.beforeRename = true;
    const failed = await store.save(stateOf("apple banana", "cherry"));
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error.kind).toBe("persistence_failure");
      expect(failed.error.message).toBe("failed to save snapshot: simulated crash between write and rename");
    }

    expect(readFileSync(store.snapshotPath, "utf8")).toBe(before);
    expect(readdirSync(dir).filter((name) => name.includes(".tmp."))).toEqual([]);

    crash.beforeRename = false;
    const loaded = await store.load();
    expect(loaded.ok).toBe(true);
    if (loaded.ok) {
      expect(loaded.value.source).toBe("snapshot");
      expect(loaded.value.state).toEqual(first);
    }
  });

  it("leaves no snapshot at all when the very first save is interrupted", async () => {
    const store = new FileSnapshotStore({ dataDir: dir });
    crash.beforeRename = true;

    expect((await store.save(stateOf("apple"))).ok).toBe(false);
    expect(readdirSync(dir)).toEqual(["backups"]);

    crash.beforeRename = false;
    const loaded = await store.load();
    expect(loaded.ok && loaded.value.source).toBe("empty");
  });
});
