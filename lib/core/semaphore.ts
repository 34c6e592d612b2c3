/**
 * Async semaphore for bounding how many queries of one turn are in flight.
 * Usage: const sem = new Semaphore(4); await sem.run(() => executor.execute(call, intent));
 */
export class Semaphore {
  private count: number;
  private readonly waiting: Array<() => void> = [];

  constructor(concurrency: number) {
    this.count = Math.max(1, concurrency);
  }

  async acquire(): Promise<void> {
    if (this.count > 0) {
      this.count--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.count++;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.count;
  }
}
