/**
 * Bulkhead configuration
 */
export interface BulkheadConfig {
  /**
   * Maximum concurrent operations
   * @default 10
   */
  maxConcurrent: number;
}

/**
 * Bulkhead for bounded fan-out: at most maxConcurrent operations run at once,
 * the rest wait in FIFO order
 */
export class BulkheadManager {
  private maxConcurrent: number;
  private activeCount = 0;
  private queue: Array<() => void> = [];

  constructor(config: Partial<BulkheadConfig> = {}) {
    this.maxConcurrent = config.maxConcurrent ?? 10;

    if (!(this.maxConcurrent > 0)) {
      throw new Error('maxConcurrent must be positive');
    }
  }

  /**
   * Executes an operation through the bulkhead, waiting for a free slot
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.activeCount < this.maxConcurrent) {
      this.activeCount++;
    } else {
      // The slot is reserved by release() before start is called
      await new Promise<void>((start) => {
        this.queue.push(start);
      });
    }

    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  /**
   * Fan-out/fan-in: applies fn to every item through the bulkhead and
   * resolves once all have settled, results in input order
   */
  async map<I, O>(items: readonly I[], fn: (item: I, index: number) => Promise<O>): Promise<O[]> {
    return Promise.all(items.map((item, index) => this.execute(() => fn(item, index))));
  }

  /**
   * Hands the freed slot to the next waiting operation
   */
  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.activeCount--;
  }
}
