import { getLogger } from './logger.js';

/**
 * Runs tasks one at a time per key; tasks under different keys run concurrently.
 * A failing task is logged and does not block the tasks queued behind it.
 */
export class KeyedTaskQueue {
  private tails = new Map<string, Promise<void>>();

  enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      (error: unknown) => {
        getLogger()?.error(
          'KeyedTaskQueue',
          `Task for ${key} failed: ${error instanceof Error ? error.message : String(error)}`
        );
      },
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }

  pendingKeys(): string[] {
    return [...this.tails.keys()];
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }
}
