/**
 * @module primitives/mutex
 * @description Promise-chained mutual exclusion.
 *
 * Tasks run one at a time in call order. A failing task releases the
 * lock like a succeeding one. A waiter whose signal aborts leaves the
 * queue without running; tasks queued after it still wait for the
 * holder.
 */

import { raceAbort } from "./abort.js";

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `task` once every previously queued task has settled.
   * Rejects with `signal.reason` if the signal aborts while waiting.
   */
  async runExclusive<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();

    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending++;

    try {
      await raceAbort(previous, signal);
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  /** True while a task holds or waits for the lock. */
  isLocked(): boolean {
    return this.pending > 0;
  }
}
