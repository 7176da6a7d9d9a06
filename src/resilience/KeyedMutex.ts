/**
 * Per-key mutual exclusion
 *
 * Operations sharing a key run one after another in call order; different
 * keys never wait on each other. A failed operation releases the lock.
 *
 * @module resilience/KeyedMutex
 */
export class KeyedMutex<K = string> {
  private tails: Map<K, Promise<void>> = new Map();

  async runExclusive<T>(key: K, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await operation();
    } finally {
      release();
      // Drop the entry once nobody is queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
