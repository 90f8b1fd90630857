/**
 * Runs tasks one at a time in submission order. A task that throws rejects
 * only its own promise; the chain carries on with the next one.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.queued += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.queued -= 1;
      },
      () => {
        this.queued -= 1;
      },
    );
    return result;
  }

  /** Tasks submitted and not yet settled. */
  get pending(): number {
    return this.queued;
  }

  /** Resolves once everything submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }
}
