/**
 * Promise-chain mutex. Callers run one at a time in arrival order;
 * a rejected section releases the lock like a resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(section: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(section).finally(() => {
      this.pending--;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** Callers holding or waiting for the lock */
  get waiting(): number {
    return this.pending;
  }
}
