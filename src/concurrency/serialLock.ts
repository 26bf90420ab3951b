/**
 * Per-inverter mutex. Limit writes for the same serial run one after another;
 * writes for different serials do not wait on each other.
 */
export class SerialLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has finished.
   * The lock is released whether `fn` resolves or rejects.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether a holder or waiter exists for `key`.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
