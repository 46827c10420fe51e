/**
 * Serializes async work per key. Callers on the same key run one at a time
 * in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previousTail = this.tails.get(key) ?? Promise.resolve();

    let release = (): void => {};
    const currentGate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const currentTail = previousTail.then(() => currentGate);
    this.tails.set(key, currentTail);

    await previousTail;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === currentTail) {
        this.tails.delete(key);
      }
    }
  }
}
