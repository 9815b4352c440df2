/**
 * Single writer lane: tasks run one at a time, in the order they were
 * queued. A failed task does not block the ones behind it.
 */
export class WriterLane {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }

  get queued(): number {
    return this.pending;
  }
}
