/**
 * FIFO queue for async work: each job starts after the previous one settles.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(work: () => Promise<T>): Promise<T> {
    const result = this.tail.then(work);
    // failures reach the caller through `result`; the chain only waits for settlement
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
