/**
 * Single-writer FIFO lock. Work queued with `run` starts only after every
 * previously queued piece of work has settled.
 */
export class WriteLock {
  private lock: Promise<void> = Promise.resolve();

  async run<T>(work: () => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await work();
    } finally {
      release();
    }
  }

  /** Resolves once all work queued so far has settled. */
  async idle(): Promise<void> {
    await this.lock;
  }
}
