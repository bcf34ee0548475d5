/**
 * Runs tasks one at a time, in enqueue order, on a promise chain.
 * A failed task rejects its own promise only; the chain continues.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  constructor(private readonly onSettled: () => void = () => {}) {}

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.depth++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.settle(),
      () => this.settle(),
    );
    return run;
  }

  /** Tasks queued or running */
  get size(): number {
    return this.depth;
  }

  /** Resolves once everything enqueued so far has settled */
  drain(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.depth--;
    this.onSettled();
  }
}
