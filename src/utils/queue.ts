/** Runs tasks one at a time, in the order they were queued */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // A failed task must not hold up the ones behind it
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
