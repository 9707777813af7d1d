/* src/runner/build/cancel-flag.ts
 * Cancellation flag shared between the owner (writer) and a build worker
 * (reader). Every access goes through a FIFO promise-chain lock.
 */

export class CancellationFlag {
  private requested = false;
  private mutex: Promise<void> = Promise.resolve();

  private async withLock<T>(fn: () => T): Promise<T> {
    const previous = this.mutex;
    let release: () => void = () => undefined;
    this.mutex = new Promise<void>((resolve) => {
      release = resolve;
    });
    try {
      await previous;
      return fn();
    } finally {
      release();
    }
  }

  /** Owner side: request cancellation. Idempotent. */
  set(): Promise<void> {
    return this.withLock(() => {
      this.requested = true;
    });
  }

  /** Worker side: read at a check point. */
  isSet(): Promise<boolean> {
    return this.withLock(() => this.requested);
  }
}
