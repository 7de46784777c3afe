/**
 * Per-key mutual exclusion.
 *
 * Work submitted under the same key runs strictly one after another in submission
 * order; work under different keys is not serialized against each other.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run `fn` once every earlier holder of `key` has settled
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
   * Whether any work is queued or running under `key`
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
