/**
 * Promise-chain mutex: tasks run one at a time in arrival order.
 * A task that rejects still releases the lock for the next one.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(execution: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(() => execution());
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  private release() {
    this.pending -= 1;
  }
}
