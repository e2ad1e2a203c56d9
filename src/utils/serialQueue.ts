/**
 * Per-key serial task queue
 *
 * Tasks submitted under the same key run one after another, in submission
 * order. Tasks under different keys run independently. Used to keep the
 * read-compute-write sequence on a user's exposure status from interleaving
 * within a function instance.
 */

export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run a task after every task previously submitted under the same key.
   * A failing task does not block the tasks queued behind it.
   *
   * @param key - Serialization key (e.g. the user id)
   * @param task - The task to run
   * @returns The task's result
   */
  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    // Drop the entry once nothing else is queued behind this task
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /**
   * Number of keys with queued or running tasks
   */
  get size(): number {
    return this.tails.size;
  }
}
