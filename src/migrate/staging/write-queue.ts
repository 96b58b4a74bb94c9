/**
 * Write Queue
 *
 * Serialises result writes from concurrent submits. Tasks run one at a time
 * in enqueue order; a failing task rejects its own promise only.
 */

export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  enqueue<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once every task enqueued so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }

  get size(): number {
    return this.pending;
  }
}
