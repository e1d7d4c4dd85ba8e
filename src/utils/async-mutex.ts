/**
 * Minimal promise-chain lock. Tasks passed to `runExclusive` run one at a
 * time in call order; a rejected task does not block the ones queued after it.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  private release(): void {
    this.pending--;
  }
}
