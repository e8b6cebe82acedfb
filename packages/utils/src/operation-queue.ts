/**
 * OperationQueue - Serializes async operations against a shared resource.
 *
 * Used as a single-writer lock: every write to one folder's cache file goes
 * through that folder's queue, so two saves never interleave.
 */
export class OperationQueue {
  private queue: Promise<void> = Promise.resolve();

  /**
   * Run an operation after all previously queued operations have settled.
   *
   * If an operation fails, the error is propagated to its caller but the
   * queue continues processing.
   */
  run<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);

    // The tail only tracks ordering; each caller observes its own result
    this.queue = result.then(
      () => undefined,
      () => undefined
    );

    return result;
  }
}
