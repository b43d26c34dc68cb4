/**
 * Per-key async mutex.
 *
 * Work for one key runs strictly one at a time, in arrival order; work for
 * different keys never waits on each other. Keys with nothing queued are
 * forgotten, so the map only holds accounts with work in flight.
 */
export class AccountLock<K = number> {
  private readonly tails = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: K): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
