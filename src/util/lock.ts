/**
 * Promise-chain mutex keyed by an arbitrary value. Callers on the same key run one at a time in
 * call order; different keys never wait on each other.
 */
export class PerKeyLock<TKey> {
  private readonly chains = new Map<TKey, Promise<void>>();

  public async runExclusive<T>(key: TKey, fn: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();

    let release!: () => void;
    const next = new Promise<void>((r) => {
      release = r;
    });
    const chain = prev.then(() => next);
    this.chains.set(key, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      queueMicrotask(() => {
        if (this.chains.get(key) === chain) this.chains.delete(key);
      });
    }
  }

  /** Waits for current holders of `key`, if any, then runs `fn` without holding the key itself. */
  public async runAfterHolders<T>(key: TKey, fn: () => T | Promise<T>): Promise<T> {
    const pending = this.chains.get(key);
    if (pending) await pending;
    return await fn();
  }

  public isHeld(key: TKey): boolean {
    return this.chains.has(key);
  }
}
