/**
 * @summary Async-aware mutual exclusion.
 * @remarks
 * Tasks passed to {@link runExclusive} run one at a time in call order. A task may
 * await I/O while holding the lock; the next task starts only once the current one
 * has settled, whether it resolved or rejected.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve()

  private queued = 0

  /**
   * @summary Number of tasks running or waiting for the lock.
   */
  get pending(): number {
    return this.queued
  }

  /**
   * @summary Run a task once every previously queued task has settled.
   * @returns The task's result; its rejection is passed through unchanged.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.queued += 1
    const run = this.tail.then(task)
    this.tail = run.then(
      () => this.release(),
      () => this.release(),
    )
    return run
  }

  private release(): void {
    this.queued -= 1
  }
}
