/**
 * Per-key mutual exclusion. Callers holding different keys run concurrently;
 * callers on the same key run one at a time in arrival order.
 */
export class KeyedLock {
  private readonly queues = new Map<string, Array<() => void>>();

  async acquire(key: string): Promise<() => void> {
    const waiters = this.queues.get(key);

    if (!waiters) {
      this.queues.set(key, []);
      return this.releaser(key);
    }

    return await new Promise<() => void>((resolve) => {
      waiters.push(() => resolve(this.releaser(key)));
    });
  }

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  // Extra calls to a releaser are no-ops
  private releaser(key: string): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release(key);
    };
  }

  private release(key: string) {
    const waiters = this.queues.get(key);
    const next = waiters?.shift();
    if (next) {
      next();
      return;
    }
    this.queues.delete(key);
  }
}
