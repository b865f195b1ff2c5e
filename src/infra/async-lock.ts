/**
 * AsyncLock: FIFO mutual exclusion for async sections.
 *
 * Backed by a p-limit queue with concurrency 1: callers run one at a time
 * in the order they asked for the lock, and the lock is released when the
 * section settles, whether it resolved or threw.
 *
 * Not re-entrant: awaiting `run` from inside a section of the same lock
 * deadlocks.
 */
import pLimit from "p-limit";

export class AsyncLock {
  private readonly limit = pLimit(1);

  /** Run `section` once every earlier section has settled. */
  run<T>(section: () => Promise<T>): Promise<T> {
    return this.limit(section);
  }

  /** True while a section is running. */
  get isLocked(): boolean {
    return this.limit.activeCount > 0;
  }

  /** Sections waiting for the lock. */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }
}
