/**
 * Runs jobs strictly one after another, in submission order. A failing job
 * rejects its own promise and does not stop the jobs queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(job: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(job);
    const settle = (): void => {
      this.pending--;
    };
    this.tail = result.then(settle, settle);
    return result;
  }

  /** Resolves once every job submitted so far has settled. */
  idle(): Promise<void> {
    return this.tail;
  }

  get size(): number {
    return this.pending;
  }
}
