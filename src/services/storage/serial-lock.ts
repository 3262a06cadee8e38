// Promise-chain lock serializing store mutations

/**
 * Runs tasks one at a time in submission order. A failing task rejects its
 * own promise and does not block the tasks queued after it.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.queued++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => { this.queued--; },
      () => { this.queued--; }
    );
    return result;
  }

  /**
   * Number of tasks submitted and not yet settled
   */
  get pending(): number {
    return this.queued;
  }

  /**
   * Resolves once every task submitted so far has settled
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
