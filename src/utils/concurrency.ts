/**
 * @fileoverview Promise-based mutual exclusion helpers.
 */

/** Simple async mutex: queued callbacks run one at a time in call order. */
export class Mutex {
  private queue: Promise<void> = Promise.resolve();

  lock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * One Mutex per key. Entries are dropped once their queue drains.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; pending: number }>();

  async lock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), pending: 0 };
      this.locks.set(key, entry);
    }
    entry.pending++;
    const current = entry;
    try {
      return await current.mutex.lock(fn);
    } finally {
      current.pending--;
      if (current.pending === 0 && this.locks.get(key) === current) {
        this.locks.delete(key);
      }
    }
  }
}

/**
 * Coalesces concurrent calls per key: while a call for a key is running,
 * later callers receive the same promise instead of starting their own.
 */
export class SingleFlight<T> {
  private readonly inFlight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const promise = fn().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    return this.inFlight.has(key);
  }
}
