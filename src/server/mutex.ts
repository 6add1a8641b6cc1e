/**
 * Promise-chain lock. Each caller waits for the previous holder's task to
 * settle before its own task runs, so tasks run one at a time in call order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: (() => void) | undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    await previous;
    try {
      return await task();
    } finally {
      release?.();
    }
  }
}
