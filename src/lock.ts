const settle = (promise: Promise<unknown>): Promise<void> =>
  promise.then(
    () => undefined,
    () => undefined,
  );

/**
 * Promise-chain mutex: tasks passed to {@link run} execute one after another in
 * call order. A rejected task does not break the chain for later callers.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const next = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = settle(next);
    return next;
  }

  /** True while a task is queued or running. */
  public get busy(): boolean {
    return this.pending > 0;
  }
}
