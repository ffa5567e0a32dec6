/**
 * Single-writer mutation point: operations run one at a time, in call order.
 * A rejected operation does not block the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pendingCount = 0;

  get pending(): number {
    return this.pendingCount;
  }

  run<T>(operation: () => T | Promise<T>): Promise<T> {
    this.pendingCount++;
    const result = this.tail.then(() => operation());
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  private release(): void {
    this.pendingCount--;
  }
}
