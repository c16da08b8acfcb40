// ============================================================================
// Keyed Lock - single writer per key
// ============================================================================

/**
 * FIFO mutual exclusion scoped to a key. Callers holding different keys never
 * wait on each other; callers sharing a key run one at a time, in call order.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether a holder or waiter exists for the key
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
