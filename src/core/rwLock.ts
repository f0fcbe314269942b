type Mode = "read" | "write";

interface Waiter {
  mode: Mode;
  grant: () => void;
}

/**
 * Async read-write lock.
 *
 * Readers share the lock; a writer holds it alone. Waiters are served in
 * arrival order, so a queued writer blocks readers that arrive after it and
 * cannot be starved by a steady stream of reads.
 *
 * @example
 * ```ts
 * const lock = new ReadWriteLock();
 * const hits = await lock.read(() => ranker.rank(terms, { index }));
 * await lock.write(() => index.clear());
 * ```
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  read<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.run("read", fn);
  }

  write<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.run("write", fn);
  }

  /** Current holders and waiters, for diagnostics. */
  state(): { readers: number; writing: boolean; waiting: number } {
    return { readers: this.readers, writing: this.writing, waiting: this.queue.length };
  }

  private async run<T>(mode: Mode, fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(mode);
    try {
      return await fn();
    } finally {
      this.release(mode);
    }
  }

  private acquire(mode: Mode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        },
      });
    });
  }

  private release(mode: Mode): void {
    if (mode === "write") {
      this.writing = false;
    } else {
      this.readers--;
    }
    this.drain();
  }

  private drain(): void {
    let next = this.queue[0];
    while (next && this.canGrant(next.mode)) {
      this.queue.shift();
      next.grant();
      next = this.queue[0];
    }
  }

  private canGrant(mode: Mode): boolean {
    return mode === "read" ? !this.writing : !this.writing && this.readers === 0;
  }

  private take(mode: Mode): void {
    if (mode === "write") {
      this.writing = true;
    } else {
      this.readers++;
    }
  }
}
