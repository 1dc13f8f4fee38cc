import { ReentrantCallError } from './ledger-errors.js';

/**
 * Scoped mutual-exclusion guard for withdrawals.
 *
 * `run()` acquires the lock before invoking `action` and releases it in a
 * `finally`, so no exit path (including a throw) leaves the guard locked.
 * A call that finds the guard locked fails immediately with
 * ReentrantCallError; it never waits for the holder.
 */
export class ReentrancyGuard {
  private locked = false;

  get isLocked(): boolean {
    return this.locked;
  }

  async run<T>(action: () => Promise<T>): Promise<T> {
    if (this.locked) {
      throw new ReentrantCallError();
    }

    this.locked = true;
    try {
      return await action();
    } finally {
      this.locked = false;
    }
  }
}
