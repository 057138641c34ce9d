/**
 * Runs async tasks one at a time in submission order. A rejected task does
 * not block the tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task, task);
    // The chain only orders tasks; each caller observes its own rejection
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}
