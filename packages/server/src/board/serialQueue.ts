/**
 * Runs async tasks one at a time, in submission order.
 *
 * A task's failure rejects only its own promise; the queue keeps going.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    // Failures are delivered through `result`; the chain itself must stay resolved.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  get size(): number {
    return this.pending;
  }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
