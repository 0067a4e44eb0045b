/**
 * Runs tasks one at a time in arrival order. A rejected task does not stall
 * the queue; its rejection goes to its own caller.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
