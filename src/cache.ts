/**
 * Result Cache
 *
 * Bounded message → verdict map, one per filter instance. Reads are plain
 * map lookups; writes queue behind a per-instance lock so that eviction
 * and insertion happen as one step. Eviction drops the oldest insertion.
 */

/** Runs async critical sections one at a time, in call order */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}

export class ResultCache {
  private readonly store = new Map<string, boolean>();
  private readonly lock = new Mutex();
  readonly maxSize: number;

  constructor(maxSize: number) {
    this.maxSize = Math.max(0, Math.floor(maxSize));
  }

  get(key: string): boolean | undefined {
    return this.store.get(key);
  }

  async put(key: string, value: boolean): Promise<void> {
    await this.lock.runExclusive(() => {
      if (this.maxSize === 0) return;

      if (!this.store.has(key) && this.store.size >= this.maxSize) {
        // Map iterates in insertion order
        const oldest = this.store.keys().next();
        if (!oldest.done) this.store.delete(oldest.value);
      }
      this.store.set(key, value);
    });
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }
}
