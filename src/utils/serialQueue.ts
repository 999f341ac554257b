/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * serialQueue.ts: Promise-chain serialization point for per-source work.
 */

/* Each source gets its own SerialQueue. Tasks run one at a time in submission order, so two access units from the same source can never be processed out of order
 * or concurrently. Separate queues never wait on each other, so a slow disk write for one source does not hold up the others.
 *
 * A failed task rejects its own promise and nothing else: the chain continues with the next task.
 */

export class SerialQueue {

  private pending = 0;
  private tail: Promise<void> = Promise.resolve();

  /**
   * Queues a task behind everything already submitted.
   * @param task - The work to run.
   * @returns A promise settling with the task's outcome.
   */
  public enqueue<T>(task: () => Promise<T> | T): Promise<T> {

    this.pending++;

    const run = this.tail.then(task).finally(() => {

      this.pending--;
    });

    this.tail = run.then(() => undefined, () => undefined);

    return run;
  }

  /**
   * Resolves once every task submitted so far has settled.
   */
  public async drain(): Promise<void> {

    await this.tail;
  }

  /**
   * @returns The number of queued or running tasks.
   */
  public get size(): number {

    return this.pending;
  }
}
