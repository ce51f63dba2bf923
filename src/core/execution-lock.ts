/**
 * FIFO async mutex. Each `runExclusive` call waits for every call queued
 * before it to settle, then runs `fn` while holding the lock.
 */
export class ExecutionLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.tail;
    let release: (() => void) | undefined;
    this.tail = new Promise<void>((r) => {
      release = r;
    });

    this.waiting++;
    await prev;
    this.waiting--;
    try {
      return await fn();
    } finally {
      release?.();
    }
  }

  /** Callers queued behind the current holder. */
  get pending(): number {
    return this.waiting;
  }
}
