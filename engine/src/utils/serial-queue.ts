/**
 * apkman Engine — Per-Key Serial Queue
 *
 * Tasks for the same key run one after another in submission order;
 * tasks for different keys run independently. A failing task is reported
 * through `onError` and never blocks the tasks queued behind it.
 */

export type TaskErrorHandler = (key: string, err: unknown) => void;

export class KeyedSerialQueue {
  private tails = new Map<string, Promise<void>>();
  private onError: TaskErrorHandler;

  constructor(onError: TaskErrorHandler) {
    this.onError = onError;
  }

  /**
   * Queue a task behind every task already queued for `key`.
   * The returned promise settles when this task has finished (it never
   * rejects; failures go to the error handler).
   */
  run(key: string, task: () => Promise<void> | void): Promise<void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    const next: Promise<void> = previous
      .then(task)
      .catch((err: unknown) => this.onError(key, err))
      .then(() => {
        if (this.tails.get(key) === next) {
          this.tails.delete(key);
        }
      });

    this.tails.set(key, next);
    return next;
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }

  /**
   * Resolve once no key has queued work, including tasks queued while
   * waiting.
   */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all([...this.tails.values()]);
    }
  }
}
