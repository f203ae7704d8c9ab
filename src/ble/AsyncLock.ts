/**
 * Promise-chained mutex that can be held across awaits.
 * Waiters acquire in FIFO order.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /** True while a holder is running or a waiter is queued. */
  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private acquire(): Promise<() => void> {
    this.holders++;
    const previous = this.tail;
    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    this.tail = previous.then(() => current);

    let released = false;
    return previous.then(() => () => {
      if (released) {
        return;
      }
      released = true;
      this.holders--;
      unlock();
    });
  }
}
