/**
 * FIFO async lock. Callers queue behind the previous holder; a rejected task
 * releases the lock like a resolved one.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  get pending(): number {
    return this.waiting;
  }

  private release(): void {
    this.waiting--;
  }
}
