/**
 * Async mutex scoped per key. Holders of different keys never wait on each
 * other; holders of the same key run one at a time in arrival order.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Promise<void>>();

  /**
   * Acquire the lock for a key. Resolves with the release function once every
   * earlier holder has released.
   */
  async acquire(key: string): Promise<() => void> {
    while (this.locks.has(key)) {
      await this.locks.get(key);
    }

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = () => {
        this.locks.delete(key);
        resolve();
      };
    });

    this.locks.set(key, held);
    return release;
  }

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }

  get size(): number {
    return this.locks.size;
  }
}
