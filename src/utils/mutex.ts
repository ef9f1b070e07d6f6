/**
 * Promise-chain lock. Tasks run one at a time in call order; a failed task
 * rejects its own caller and does not block the ones queued behind it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

interface KeyedEntry {
  mutex: Mutex;
  pending: number;
}

/** One {@link Mutex} per key, dropped once its queue drains. */
export class KeyedMutex {
  private entries = new Map<string, KeyedEntry>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), pending: 0 };
      this.entries.set(key, entry);
    }

    const current = entry;
    current.pending++;
    try {
      return await current.mutex.runExclusive(task);
    } finally {
      current.pending--;
      if (current.pending === 0) {
        this.entries.delete(key);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
