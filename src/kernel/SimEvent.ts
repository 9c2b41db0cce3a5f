/**
 * Wait/notify condition for cooperative tasks.
 *
 * `notify()` wakes every task currently waiting. A woken task resumes after the
 * notifier reaches its next suspension point, so callers always re-check the
 * condition they were waiting for.
 */
export class SimEvent {
  private waiters: Array<() => void> = [];

  wait(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  notify(): void {
    if (this.waiters.length === 0) return;

    const woken = this.waiters;
    this.waiters = [];
    for (const resolve of woken) {
      resolve();
    }
  }

  get waiting(): number {
    return this.waiters.length;
  }
}
