import { describe, expect, it } from "vitest";
import { ReadWriteLock } from "../rwLock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

describe("ReadWriteLock", () => {
  it("lets readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();

    const r1 = lock.read(() => gate.promise);
    const r2 = lock.read(() => gate.promise);
    expect(lock.state()).toEqual({ readers: 2, writing: false, waiting: 0 });

    gate.resolve();
    await Promise.all([r1, r2]);
    expect(lock.state()).toEqual({ readers: 0, writing: false, waiting: 0 });
  });

  it("makes a writer wait for active readers and later readers wait for the writer", async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];
    const gate = deferred();

    const r1 = lock.read(async () => {
      order.push("r1 start");
      await gate.promise;
      order.push("r1 end");
    });
    const w = lock.write(() => {
      order.push("w");
    });
    const r2 = lock.read(() => {
      order.push("r2");
    });

    await tick();
    expect(order).toEqual(["r1 start"]);
    expect(lock.state()).toEqual({ readers: 1, writing: false, waiting: 2 });

    gate.resolve();
    await Promise.all([r1, w, r2]);
    expect(order).toEqual(["r1 start", "r1 end", "w", "r2"]);
  });

  it("runs writers one at a time", async () => {
    const lock = new ReadWriteLock();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 5 }, () =>
        lock.write(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await tick();
          active--;
        }),
      ),
    );
    expect(maxActive).toBe(1);
  });

  it("releases the lock when the critical section throws", async () => {
    const lock = new ReadWriteLock();

    await expect(
      lock.write(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await lock.read(() => "still usable")).toBe("still usable");
    expect(lock.state()).toEqual({ readers: 0, writing: false, waiting: 0 });
  });
});
