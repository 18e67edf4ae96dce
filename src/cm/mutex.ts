/**
 * Mutex
 *
 * Exclusive async lock that owns the value it protects.
 *
 * @module cm/mutex
 */

/**
 * The value is only reachable inside `runExclusive`, so holders cannot leak
 * it past release.
 */
export class Mutex<T> {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(private readonly value: T) {}

  /** Holders plus waiters */
  get pending(): number {
    return this.queued;
  }

  get isLocked(): boolean {
    return this.queued > 0;
  }

  /**
   * Run `fn` once every earlier holder has released. The lock is released
   * when `fn` settles, whether it resolves or throws.
   */
  async runExclusive<R>(fn: (value: T) => Promise<R> | R): Promise<R> {
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => held);
    this.queued++;

    await previous;
    try {
      return await fn(this.value);
    } finally {
      this.queued--;
      release();
    }
  }
}
