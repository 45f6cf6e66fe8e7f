/**
 * Per-key serialisation of async tasks.
 *
 * Tasks sharing a key run one at a time in submission order; tasks on
 * different keys never wait on each other. Used to serialise writers on the
 * same storage row (a user's credential, a (user, role) grant, a role's
 * permission set) without a global lock.
 *
 * @module utils/keyedLock
 */

export class KeyedLock {
  /** key → settled-safe tail of the chain currently queued for that key */
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled.
   * The task's result or rejection is passed through unchanged.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get pendingKeys(): number {
    return this.tails.size;
  }
}
