/**
 * Promise-chain mutex: tasks run one at a time in submission order.
 * A failing task rejects its own caller and does not break the chain.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(fn: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const result = this.tail
      .then(() => fn())
      .finally(() => {
        this.pending -= 1;
      });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}
