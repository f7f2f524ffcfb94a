/**
 * FIFO task queue: each task starts only after the previous one settled.
 *
 * One instance per session serializes every mutation of session state; one
 * instance per store serializes durable appends.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const next = this.tail.then(() => task()).finally(() => {
      this.pending -= 1;
    });
    // The queue itself never rejects; callers observe failures through `next`.
    this.tail = next.catch(() => undefined);
    return next;
  }

  /** Tasks queued or running. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once everything queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}
