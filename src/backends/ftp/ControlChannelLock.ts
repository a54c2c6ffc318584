/**
 * Serializes commands on an FTP control connection.
 *
 * An FTP session runs one command (and its data transfer) at a time, while
 * callers of the backend may issue operations concurrently. Tasks passed to
 * run() execute strictly in call order, chained on promises.
 */
export class ControlChannelLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /**
   * Run `task` once every previously queued task has settled.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.waiting++;
    try {
      await previous;
      return await task();
    } finally {
      this.waiting--;
      release();
    }
  }

  /** Whether a task is running or queued (for diagnostics) */
  get isLocked(): boolean {
    return this.waiting > 0;
  }

  /** Tasks running or queued (for diagnostics) */
  get queueLength(): number {
    return this.waiting;
  }
}
