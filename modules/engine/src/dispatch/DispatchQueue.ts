/**
 * modules/engine/src/dispatch/DispatchQueue.ts
 *
 * @file Single-consumer FIFO. Tasks run strictly one after another in submission order, whatever source submitted
 * them; a failing task does not stop the ones behind it.
 */

export class DispatchQueue {
  private tail: Promise<void> = Promise.resolve();
  private closed = false;
  private pending = 0;

  /**
   * Append a task.
   *
   * @param task - Work to run once every earlier task has settled.
   * @returns The task's own result.
   */
  enqueue<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error('dispatch queue is closed'));
    }
    this.pending++;
    const run = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }

  /**
   * Stop accepting tasks and wait for the queued ones to finish.
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.tail;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Tasks queued or running. */
  get size(): number {
    return this.pending;
  }
}
