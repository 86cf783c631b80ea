// src/core/concurrency/mutex.ts
// Non-reentrant async mutex with a FIFO wait queue

let nextMutexId = 0;

/**
 * Reset mutex ids (for testing).
 */
export function resetMutexIds(): void {
  nextMutexId = 0;
}

export class Mutex {
  readonly id = `mutex-${nextMutexId++}`;
  private held = false;
  private readonly waitQueue: Array<() => void> = [];
  /** Total successful acquisitions */
  acquisitionCount = 0;

  constructor(readonly name?: string) {}

  get isLocked(): boolean {
    return this.held;
  }

  get waiting(): number {
    return this.waitQueue.length;
  }

  acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      this.acquisitionCount++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waitQueue.push(() => {
        this.acquisitionCount++;
        resolve();
      });
    });
  }

  /** Hand the lock to the next waiter, or free it. */
  release(): void {
    if (!this.held) throw new Error(`${this.id} is not locked`);
    const next = this.waitQueue.shift();
    if (next) next();
    else this.held = false;
  }

  async withLock<T>(body: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await body();
    } finally {
      this.release();
    }
  }
}
