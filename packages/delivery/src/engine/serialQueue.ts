/**
 * Serial Queue
 *
 * Single logical loop for all delivery work: tasks run one at a time in
 * submission order, so directory processing, polls and rescans never
 * interleave around the ledger or the filesystem.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /**
   * Queue a task; the returned promise settles with the task's own outcome
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(task).finally(() => {
      this.queued--;
    });
    // The chain only orders tasks; failures surface through `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Tasks queued or running
   */
  get size(): number {
    return this.queued;
  }

  get idle(): boolean {
    return this.queued === 0;
  }

  /**
   * Resolves once everything queued so far has settled
   */
  async onIdle(): Promise<void> {
    while (this.queued > 0) {
      await this.tail;
    }
  }
}
